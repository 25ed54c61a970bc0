import type { Flow } from '../types/flow';
import type { ValidationIssue } from '../types/errors';

/**
 * Registry of flow definitions.
 */
export interface FlowRegistry {
  /** Register a flow (validates first) */
  register(flow: Flow): void;

  /** Get flow by slug */
  get(slug: string): Flow | undefined;

  /** Check if flow exists */
  has(slug: string): boolean;

  /** List all flow slugs */
  slugs(): string[];

  /** Validate without registering */
  validate(flow: Flow): ValidationIssue[];
}
