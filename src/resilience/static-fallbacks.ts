/**
 * Static Fallback Responses
 *
 * Fixed texts used when no safe, grounded answer can be produced.
 */

const STATIC_RESPONSES = new Map<string, string>([
  ['degraded', 'I\'m having trouble generating an answer right now because one of our services is temporarily unavailable. I\'ve flagged this conversation for a member of our team, who will follow up with you.'],

  ['refusal', 'I\'m sorry, but I can\'t provide a reliable answer to that. I\'ve passed your question to a member of our team so they can help you directly.'],

  ['handoff', 'Of course. I\'m connecting you with a member of our support team, who will pick up this conversation shortly.'],

  ['handoff_confirmed', 'Thanks! I\'ve passed your conversation to our support team. They will contact you at the address you provided.'],

  ['collect_email', 'I\'d like a member of our team to follow up on this. Could you share your email address so they can reach you?'],

  ['math_error', 'I couldn\'t evaluate that expression. Please check it and try again using numbers and the operators + - * / ^ and parentheses.'],
]);

export type FallbackKey = 'degraded' | 'refusal' | 'handoff' | 'handoff_confirmed' | 'collect_email' | 'math_error';

export function getStaticFallback(key: FallbackKey): string {
  return STATIC_RESPONSES.get(key) ?? getDefaultFallback();
}

/** Universal fallback: generic apology, always paired with a handoff. */
export function getDefaultFallback(): string {
  return 'I\'m sorry, something went wrong while handling your message. A member of our team has been notified and will get back to you.';
}
