import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv, { JSONSchemaType } from 'ajv';
import { EmbeddingProvider, SeedDocument } from './types';
import { InMemoryVectorStore, VectorEntry } from './vector-store';
import { logger } from '../observability/logger';

const SEED_SCHEMA: JSONSchemaType<SeedDocument[]> = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      title: { type: 'string' },
      filename: { type: 'string', nullable: true },
      url: { type: 'string', nullable: true },
      sections: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            locator: { type: 'string', nullable: true },
            content: { type: 'string' },
          },
          required: ['content'],
        },
      },
    },
    required: ['title', 'sections'],
  },
};

const isSeedFile = new Ajv({ allErrors: true }).compile(SEED_SCHEMA);

/**
 * Read `knowledge/<kbId>.yaml` seed files from `dir`.
 * Returns kbId → documents; invalid files are logged and skipped.
 */
export function readSeedDocuments(dir: string): Map<string, SeedDocument[]> {
  const corpora = new Map<string, SeedDocument[]>();
  if (!fs.existsSync(dir)) {
    logger.warn({ dir }, 'Knowledge seed directory not found');
    return corpora;
  }

  const files = fs.readdirSync(dir).filter((f) => f.endsWith('.yaml') || f.endsWith('.yml'));
  for (const file of files) {
    const filepath = path.join(dir, file);
    try {
      const parsed: unknown = yaml.load(fs.readFileSync(filepath, 'utf-8'));
      if (!isSeedFile(parsed)) {
        logger.error({ filepath, errors: isSeedFile.errors }, 'Invalid knowledge seed file');
        continue;
      }
      corpora.set(path.basename(file, path.extname(file)), parsed);
    } catch (err) {
      logger.error({ err, filepath }, 'Failed to load knowledge seed file');
    }
  }
  return corpora;
}

/** Embed every section of every seed document and load it into the store. */
export async function seedVectorStore(
  store: InMemoryVectorStore,
  embeddings: EmbeddingProvider,
  corpora: Map<string, SeedDocument[]>,
): Promise<number> {
  let total = 0;
  for (const [kbId, documents] of corpora) {
    const pending: Array<Omit<VectorEntry, 'embedding'>> = [];
    documents.forEach((doc, docIndex) => {
      doc.sections.forEach((section, sectionIndex) => {
        pending.push({
          id: `${kbId}:${docIndex}:${sectionIndex}`,
          content: section.content,
          metadata: { title: doc.title, filename: doc.filename, locator: section.locator, url: doc.url },
        });
      });
    });
    if (pending.length === 0) continue;

    const vectors = await embeddings.embedBatch(pending.map((p) => p.content));
    store.clear(kbId);
    store.addEntries(kbId, pending.map((p, i) => ({ ...p, embedding: vectors[i] ?? [] })));
    total += pending.length;
    logger.info({ kbId, chunks: pending.length }, 'Knowledge base seeded');
  }
  return total;
}
