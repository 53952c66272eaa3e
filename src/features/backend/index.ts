import type { FuzzConfig } from '@/lib/config';
import { createReferenceBackend, REFERENCE_BACKEND } from './referenceBackend';
import type { ScorerBackend } from './types';

export function getScorerBackend(config: FuzzConfig): ScorerBackend {
  switch (config.backend) {
    case REFERENCE_BACKEND:
      return createReferenceBackend({ autojunk: config.autojunk });
    default:
      throw new Error(`Unknown scorer backend: ${config.backend}`);
  }
}

export { createReferenceBackend, REFERENCE_BACKEND } from './referenceBackend';
export type { ScorerBackend } from './types';
