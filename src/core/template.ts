import type { Blackboard, BlackboardValue } from './blackboard.js';
import { MissingContextError } from './errors.js';

// {key} is required, {key?} renders empty when the key is absent
const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)(\?)?\}/g;

export type TemplateReference = { key: string; optional: boolean };

/** Lists the blackboard keys a template refers to, in order of appearance. */
export function templateReferences(template: string): TemplateReference[] {
  const refs: TemplateReference[] = [];
  for (const m of template.matchAll(PLACEHOLDER)) {
    const key = m[1];
    if (key !== undefined) refs.push({ key, optional: m[2] === '?' });
  }
  return refs;
}

function stringify(value: BlackboardValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Substitutes blackboard values into a template. A required key that is not
 * on the blackboard raises {@link MissingContextError} rather than
 * rendering blank.
 */
export function renderTemplate(template: string, board: Blackboard, where?: string): string {
  return template.replace(PLACEHOLDER, (_match, key: string, optional: string | undefined) => {
    const value = board.get(key);
    if (value === undefined) {
      if (optional) return '';
      throw new MissingContextError(key, where);
    }
    return stringify(value);
  });
}
