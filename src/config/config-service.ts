import * as fs from 'fs';
import * as path from 'path';
import Ajv, { JSONSchemaType } from 'ajv';
import { TenantConfig, TenantConfigFile } from './types';
import { env } from './env';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/config/ or src/config/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_CONFIG_DIR = path.resolve(PROJECT_ROOT, 'config', 'tenants');

/** Requests, not topics: "human resources" or "the support team's hours" stay questions. */
export const DEFAULT_HUMAN_REQUEST_PHRASES = [
  'talk to a human',
  'speak to a human',
  'speak with a human',
  'talk to a person',
  'speak to a person',
  'real person',
  'live agent',
  'human agent',
  'talk to someone',
  'speak to someone',
  'talk to an agent',
  'speak to an agent',
  'speak with an agent',
  'talk to a representative',
  'speak to a representative',
  'connect me to support',
  'escalate this',
];

const optionalNumber = { type: 'number', nullable: true } as const;
const optionalInteger = { type: 'integer', minimum: 1, nullable: true } as const;

const TENANT_FILE_SCHEMA: JSONSchemaType<TenantConfigFile> = {
  type: 'object',
  properties: {
    tenantId: { type: 'string', minLength: 1 },
    escalation: {
      type: 'object',
      nullable: true,
      properties: {
        confidenceThreshold: { ...optionalNumber, minimum: 0, maximum: 1 },
        noMatchThreshold: { ...optionalNumber, minimum: 0, maximum: 1 },
        repeatThreshold: optionalInteger,
        duplicateSimilarity: { ...optionalNumber, minimum: 0, maximum: 1 },
        duplicateWindow: optionalInteger,
      },
      required: [],
      additionalProperties: false,
    },
    retrieval: {
      type: 'object',
      nullable: true,
      properties: {
        topK: optionalInteger,
        maxContextChars: { type: 'integer', minimum: 100, nullable: true },
      },
      required: [],
      additionalProperties: false,
    },
    historyWindow: { type: 'integer', minimum: 0, nullable: true },
    humanRequestPhrases: { type: 'array', items: { type: 'string', minLength: 1 }, nullable: true },
    promptVersion: { type: 'string', minLength: 1, nullable: true },
  },
  required: ['tenantId'],
  additionalProperties: false,
};

const validateTenantFile = new Ajv({ allErrors: true }).compile(TENANT_FILE_SCHEMA);

export class ConfigService {
  private configs: Map<string, TenantConfig> = new Map();

  constructor(private readonly configDir: string = DEFAULT_CONFIG_DIR) {
    this.loadAll();
  }

  loadAll(): void {
    this.configs.clear();
    this.configs.set('default', ConfigService.builtInDefault());
    if (!fs.existsSync(this.configDir)) {
      logger.warn({ dir: this.configDir }, 'Tenant config directory not found; using built-in default');
      return;
    }

    const files = fs.readdirSync(this.configDir).filter((f) => f.endsWith('.json'));
    for (const file of files) {
      try {
        const raw: unknown = JSON.parse(fs.readFileSync(path.join(this.configDir, file), 'utf-8'));
        if (!validateTenantFile(raw)) {
          logger.error({ file, errors: validateTenantFile.errors }, 'Invalid tenant config');
          continue;
        }
        this.configs.set(raw.tenantId, ConfigService.merge(ConfigService.builtInDefault(raw.tenantId), raw));
        logger.info({ tenantId: raw.tenantId }, 'Loaded tenant config');
      } catch (err) {
        logger.error({ file, err }, 'Failed to load tenant config');
      }
    }
  }

  get(tenantId: string): TenantConfig {
    return this.configs.get(tenantId) ?? this.configs.get('default') ?? ConfigService.builtInDefault();
  }

  tenantIds(): string[] {
    return [...this.configs.keys()];
  }

  /** Fields omitted (or null) in the file keep the base value */
  static merge(base: TenantConfig, file: TenantConfigFile): TenantConfig {
    const esc = file.escalation ?? {};
    const ret = file.retrieval ?? {};
    return {
      tenantId: file.tenantId,
      escalation: {
        confidenceThreshold: esc.confidenceThreshold ?? base.escalation.confidenceThreshold,
        noMatchThreshold: esc.noMatchThreshold ?? base.escalation.noMatchThreshold,
        repeatThreshold: esc.repeatThreshold ?? base.escalation.repeatThreshold,
        duplicateSimilarity: esc.duplicateSimilarity ?? base.escalation.duplicateSimilarity,
        duplicateWindow: esc.duplicateWindow ?? base.escalation.duplicateWindow,
      },
      retrieval: {
        topK: ret.topK ?? base.retrieval.topK,
        maxContextChars: ret.maxContextChars ?? base.retrieval.maxContextChars,
      },
      historyWindow: file.historyWindow ?? base.historyWindow,
      humanRequestPhrases: file.humanRequestPhrases ?? base.humanRequestPhrases,
      promptVersion: file.promptVersion ?? base.promptVersion,
    };
  }

  static builtInDefault(tenantId = 'default'): TenantConfig {
    return {
      tenantId,
      escalation: {
        confidenceThreshold: env.escalation.confidenceThreshold,
        noMatchThreshold: env.escalation.noMatchThreshold,
        repeatThreshold: env.escalation.repeatThreshold,
        duplicateSimilarity: env.escalation.duplicateSimilarity,
        duplicateWindow: env.escalation.duplicateWindow,
      },
      retrieval: {
        topK: env.retrieval.topK,
        maxContextChars: env.retrieval.maxContextChars,
      },
      historyWindow: env.retrieval.historyWindow,
      humanRequestPhrases: [...DEFAULT_HUMAN_REQUEST_PHRASES],
      promptVersion: 'v1',
    };
  }
}
