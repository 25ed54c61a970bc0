import type { Flow } from '../types/flow';
import type { ValidationIssue } from '../types/errors';

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export function validateFlow(flow: Flow): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (!flow.slug) {
    issues.push({ path: 'slug', message: 'Required', severity: 'error' });
  } else if (!SLUG_PATTERN.test(flow.slug)) {
    issues.push({ path: 'slug', message: `"${flow.slug}" is not a valid slug`, severity: 'error' });
  }

  if (!flow.stages || flow.stages.length === 0) {
    issues.push({ path: 'stages', message: 'At least one stage required', severity: 'error' });
    return issues;
  }

  const seen = new Set<string>();
  flow.stages.forEach((stage, i) => {
    if (!stage.id) issues.push({ path: `stages.${i}.id`, message: 'Required', severity: 'error' });
    if (!stage.kind) issues.push({ path: `stages.${i}.kind`, message: 'Required', severity: 'error' });
    if (!stage.name) issues.push({ path: `stages.${i}.name`, message: 'Required', severity: 'error' });

    if (stage.id && seen.has(stage.id)) {
      issues.push({ path: `stages.${i}.id`, message: `Duplicate stage id "${stage.id}"`, severity: 'error' });
    }
    seen.add(stage.id);
  });

  if (!flow.title) {
    issues.push({ path: 'title', message: 'No title; challenges will show the slug', severity: 'warning' });
  }

  return issues;
}
