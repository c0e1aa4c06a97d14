import Ajv, { JSONSchemaType } from 'ajv';
import { GenerationOutput, ReviewVerdict } from './types';
import { PermanentError } from '../resilience/errors';

/** What the primary agent must return. */
export interface DraftContract {
  answer: string;
  confidence: number;
  citations: number[];
}

/** What the review agent must return. */
export interface ReviewContract {
  verdict: ReviewVerdict;
  confidence: number;
  revised_answer?: string;
  citations?: number[];
  reason?: string;
}

export const DRAFT_CONTRACT_SCHEMA: JSONSchemaType<DraftContract> = {
  type: 'object',
  properties: {
    answer: { type: 'string' },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
    citations: { type: 'array', items: { type: 'integer', minimum: 1 } },
  },
  required: ['answer', 'confidence', 'citations'],
};

export const REVIEW_CONTRACT_SCHEMA: JSONSchemaType<ReviewContract> = {
  type: 'object',
  properties: {
    verdict: { type: 'string', enum: ['pass', 'rewrite', 'reject'] },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
    revised_answer: { type: 'string', nullable: true },
    citations: { type: 'array', items: { type: 'integer', minimum: 1 }, nullable: true },
    reason: { type: 'string', nullable: true },
  },
  required: ['verdict', 'confidence'],
};

const ajv = new Ajv({ allErrors: true });
const validateDraft = ajv.compile(DRAFT_CONTRACT_SCHEMA);
const validateReview = ajv.compile(REVIEW_CONTRACT_SCHEMA);

/** Strip markdown code fences and parse. Malformed output is a permanent failure. */
function parseJson(raw: string, dependency: string): unknown {
  let jsonStr = raw.trim();

  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```(?:json)?\s*/, '').replace(/\s*```$/, '');
  }

  try {
    return JSON.parse(jsonStr);
  } catch (err) {
    throw new PermanentError('Generation output is not valid JSON', dependency, { cause: err });
  }
}

export function parseDraft(raw: string): GenerationOutput {
  const parsed = parseJson(raw, 'generation');
  if (!validateDraft(parsed)) {
    throw new PermanentError(`Draft violates response contract: ${ajv.errorsText(validateDraft.errors)}`, 'generation');
  }
  return {
    text: parsed.answer.trim(),
    confidence: parsed.confidence,
    citations: parsed.citations,
  };
}

export function parseReview(raw: string): GenerationOutput {
  const parsed = parseJson(raw, 'generation');
  if (!validateReview(parsed)) {
    throw new PermanentError(`Review violates response contract: ${ajv.errorsText(validateReview.errors)}`, 'generation');
  }
  return {
    text: parsed.revised_answer?.trim() ?? '',
    confidence: parsed.confidence,
    citations: parsed.citations ?? [],
    verdict: parsed.verdict,
    reason: parsed.reason,
  };
}
