import { RouteDecision } from './types';
import { MAX_EXPRESSION_LENGTH } from './math-evaluator';

export interface RouterOptions {
  /** An earlier turn asked for a contact address before handoff */
  pendingContactRequest: boolean;
  /** Phrases that count as asking for a human (matched on word boundaries) */
  humanRequestPhrases: string[];
}

const EMAIL_PATTERN = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/i;

const SMALL_TALK = [
  /^(hi|hello|hey|hiya|howdy|greetings|yo)( there)?$/,
  /^good (morning|afternoon|evening|day)$/,
  /^(thanks|thank you|thx|ty)( (so|very) much)?( for (your|the) help)?$/,
  /^(ok|okay|cool|great|nice|perfect|got it|sounds good)$/,
  /^(bye|goodbye|see you|see ya|good night)$/,
  /^how are you( doing)?( today)?$/,
  /^(who|what) are you$/,
];

const MATH_PREFIX = /^(what is|what's|whats|calculate|compute|evaluate|solve|how much is)\s+/;
const MATH_OPERATOR = /[+\-*/%^]|\b(sqrt|abs|round|floor|ceil|min|max|pow)\s*\(/;
const MATH_WORDS = /^(?:[0-9+\-*/%^().,\s]|pi|e|sqrt|abs|round|floor|ceil|min|max|pow)+$/;
/** 555-1234, (555) 123-4567, 2026-03-01 */
const DIGIT_GROUPS = /^[\d\s()-]+$/;

function normalize(message: string): string {
  return message
    .toLowerCase()
    .replace(/[!?.,;:]+$/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function extractEmail(message: string): string | undefined {
  return EMAIL_PATTERN.exec(message)?.[0].toLowerCase();
}

export function isSmallTalk(message: string): boolean {
  const text = normalize(message).replace(/[!?.,]/g, '');
  return SMALL_TALK.some((pattern) => pattern.test(text));
}

export function requestsHuman(message: string, phrases: string[]): boolean {
  const text = normalize(message);
  return phrases.some((phrase) => new RegExp(`\\b${escapeRegExp(phrase.toLowerCase())}\\b`).test(text));
}

/** The arithmetic expression inside a math-only message, if there is one. */
export function extractExpression(message: string): string | undefined {
  const text = message.toLowerCase().trim().replace(/[?=]+$/, '').trim();
  const body = text.replace(MATH_PREFIX, '').trim();
  if (!body || body.length > MAX_EXPRESSION_LENGTH) return undefined;
  // Phone numbers and dates count as math only when asked as a calculation
  if (body === text && DIGIT_GROUPS.test(body) && /\d-\d/.test(body)) return undefined;
  if (!MATH_WORDS.test(body)) return undefined;
  if (!/[0-9]/.test(body) || !MATH_OPERATOR.test(body)) return undefined;
  return body;
}

/**
 * Classify an incoming message. Order matters: a pending contact request
 * wins, then explicit human requests, then math, then small talk.
 * Everything else is a knowledge-base question.
 */
export function routeMessage(message: string, options: RouterOptions): RouteDecision {
  if (options.pendingContactRequest) {
    const email = extractEmail(message);
    if (email) return { kind: 'contact_provided', email };
  }

  if (requestsHuman(message, options.humanRequestPhrases)) {
    return { kind: 'escalation_request' };
  }

  const expression = extractExpression(message);
  if (expression) return { kind: 'math_query', expression };

  if (isSmallTalk(message)) return { kind: 'conversational' };

  return { kind: 'kb_query' };
}
