import type { FormField } from './types.js';

function humanize(identifier: string): string {
  return identifier.replace(/[_-]/g, ' ').trim();
}

/**
 * Question text for a field: label, then placeholder, then name, then id.
 */
export function extractQuestion(field: Pick<FormField, 'label' | 'placeholder' | 'name' | 'id'>): string {
  return (
    field.label.trim() ||
    field.placeholder.trim() ||
    humanize(field.name) ||
    humanize(field.id)
  );
}
