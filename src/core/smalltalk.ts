/**
 * Short greetings are answered locally, without a model round trip
 */

const GREETING_WORDS = new Set([
  'hi',
  'hello',
  'hey',
  'yo',
  'sup',
  'hola',
  'hoi',
  'hallo',
  'heyo',
  'goedemorgen',
  'goedemiddag',
  'goedenavond',
]);

const DUTCH_GREETINGS = new Set(['hoi', 'hallo', 'goedemorgen', 'goedemiddag', 'goedenavond']);

export const DUTCH_GREETING_REPLY = 'Hoi! Ik ben er. Zeg maar wat je wilt doen, dan help ik je direct.';
export const ENGLISH_GREETING_REPLY = "Hey! I'm here. Tell me what you want to build or fix.";

export function maybeHandleSmalltalk(userInput: string): string | undefined {
  const cleaned = userInput.toLowerCase().replace(/[^a-z0-9\s]/g, ' ').trim();
  if (!cleaned) {
    return undefined;
  }

  const words = cleaned.split(/\s+/);
  if (words.length > 3 || !words.every(word => GREETING_WORDS.has(word))) {
    return undefined;
  }

  return words.some(word => DUTCH_GREETINGS.has(word)) ? DUTCH_GREETING_REPLY : ENGLISH_GREETING_REPLY;
}
