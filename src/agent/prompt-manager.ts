import * as fs from 'fs';
import * as path from 'path';
import Ajv, { JSONSchemaType } from 'ajv';
import { AgentRole } from './types';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/agent/ or src/agent/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const DEFAULT_PROMPTS_DIR = path.resolve(PROJECT_ROOT, 'prompts');

export type PromptBundle = Record<AgentRole, string> & { version: string };

interface VersionEntry {
  primary: string;
  reviewer: string;
  approved: boolean;
}

interface VersionsFile {
  default: string;
  versions: Record<string, VersionEntry>;
}

const VERSIONS_SCHEMA: JSONSchemaType<VersionsFile> = {
  type: 'object',
  properties: {
    default: { type: 'string' },
    versions: {
      type: 'object',
      required: [],
      additionalProperties: {
        type: 'object',
        properties: {
          primary: { type: 'string' },
          reviewer: { type: 'string' },
          approved: { type: 'boolean' },
        },
        required: ['primary', 'reviewer', 'approved'],
      },
    },
  },
  required: ['default', 'versions'],
};

const isVersionsFile = new Ajv({ allErrors: true }).compile(VERSIONS_SCHEMA);

export const FALLBACK_BUNDLE: PromptBundle = {
  version: 'fallback',
  primary: 'You are a helpful support assistant. Answer only from the provided context. Respond in JSON with "answer", "confidence" and "citations".',
  reviewer: 'You review a draft answer for safety and accuracy. Respond in JSON with "verdict" (pass, rewrite or reject), "confidence" and, for rewrite, "revised_answer".',
};

export class PromptManager {
  private bundles: Map<string, PromptBundle> = new Map();
  private defaultVersion = 'v1';

  constructor(private readonly promptsDir: string = DEFAULT_PROMPTS_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.bundles.clear();

    const versionsPath = path.join(this.promptsDir, 'versions.json');
    if (!fs.existsSync(versionsPath)) {
      logger.warn({ dir: this.promptsDir }, 'prompts/versions.json not found; building default bundle from markdown files');
      this.loadFallbackBundle();
      return;
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(versionsPath, 'utf-8'));
      if (!isVersionsFile(parsed)) {
        logger.error({ errors: isVersionsFile.errors }, 'Invalid prompts/versions.json');
        this.loadFallbackBundle();
        return;
      }
      this.defaultVersion = parsed.default;

      for (const [version, meta] of Object.entries(parsed.versions)) {
        if (!meta.approved) {
          logger.warn({ version }, 'Prompt version not approved; skipping');
          continue;
        }
        this.bundles.set(version, {
          version,
          primary: this.readPromptFile(meta.primary),
          reviewer: this.readPromptFile(meta.reviewer),
        });
        logger.info({ version }, 'Loaded prompt bundle');
      }
    } catch (err) {
      logger.error({ err }, 'Failed to load prompt versions');
      this.loadFallbackBundle();
    }
  }

  private readPromptFile(filename: string): string {
    const filepath = path.join(this.promptsDir, filename);
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'Prompt file not found');
      return '';
    }
    return fs.readFileSync(filepath, 'utf-8');
  }

  private loadFallbackBundle(): void {
    this.bundles.set('v1', {
      version: 'v1',
      primary: this.readPromptFile('primary.md') || FALLBACK_BUNDLE.primary,
      reviewer: this.readPromptFile('reviewer.md') || FALLBACK_BUNDLE.reviewer,
    });
    this.defaultVersion = 'v1';
  }

  get(version?: string): PromptBundle {
    const v = version ?? this.defaultVersion;
    const bundle = this.bundles.get(v);
    if (!bundle) {
      logger.warn({ version: v }, 'Prompt version not found; using default');
      return this.bundles.get(this.defaultVersion) ?? FALLBACK_BUNDLE;
    }
    return bundle;
  }

  /** System prompt for one agent role */
  instructions(role: AgentRole, version?: string): string {
    return this.get(version)[role] || FALLBACK_BUNDLE[role];
  }
}
