import { fileURLToPath } from 'node:url';

const DATA_DIR = new URL('../data/', import.meta.url);

export const config = {
  validator: {
    // Remote $validate is skipped when no endpoint is configured
    url: process.env.VALIDATOR_URL ?? '',
    timeout: parseInt(process.env.VALIDATOR_TIMEOUT_MS ?? '5000'),
  },
  terminology: {
    dir: process.env.TERMINOLOGY_DIR ?? fileURLToPath(new URL('terminology/', DATA_DIR)),
  },
  extraction: {
    lexiconPath: process.env.LEXICON_PATH ?? fileURLToPath(new URL('patterns/lexicon.json', DATA_DIR)),
  },
  bundle: {
    includeProvenance: process.env.INCLUDE_PROVENANCE === 'true',
  },
  logLevel: process.env.LOG_LEVEL ?? 'info',
};

export type PipelineConfig = typeof config;
