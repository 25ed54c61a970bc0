import type { Flow } from '../types/flow';
import type { FlowRegistry } from '../interfaces/flow-registry';
import type { StageRegistry } from '../interfaces/stage-registry';
import type { ValidationIssue } from '../types/errors';
import { FlowValidationError } from '../types/errors';
import { validateFlow } from '../utils/validation';

/**
 * In-memory flow registry. Given a stage registry, it also checks that every
 * stage kind is registered and that each stage config passes its own checks.
 */
export class DefaultFlowRegistry implements FlowRegistry {
  private flows = new Map<string, Flow>();

  constructor(private readonly stages?: StageRegistry) {}

  register(flow: Flow): void {
    const issues = this.validate(flow);
    if (issues.some(i => i.severity === 'error')) {
      throw new FlowValidationError(flow.slug, issues);
    }

    if (this.flows.has(flow.slug)) {
      throw new Error(`Flow "${flow.slug}" already registered`);
    }

    this.flows.set(flow.slug, flow);
  }

  get(slug: string): Flow | undefined {
    return this.flows.get(slug);
  }

  has(slug: string): boolean {
    return this.flows.has(slug);
  }

  slugs(): string[] {
    return [...this.flows.keys()];
  }

  validate(flow: Flow): ValidationIssue[] {
    const issues = validateFlow(flow);
    if (!this.stages || !flow.stages) return issues;

    flow.stages.forEach((binding, i) => {
      if (!binding.kind) return;
      const stage = this.stages?.get(binding.kind);
      if (!stage) {
        issues.push({ path: `stages.${i}.kind`, message: `Unknown stage kind "${binding.kind}"`, severity: 'error' });
        return;
      }
      for (const issue of stage.validateConfig?.(binding.config ?? {}) ?? []) {
        issues.push({ ...issue, path: `stages.${i}.config.${issue.path}` });
      }
    });

    return issues;
  }
}
