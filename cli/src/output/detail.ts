/**
 * Key/value detail blocks for `show`, `create` and `update` output.
 *
 *   ID: 12
 *   Name: Grow revenue
 *
 *   Relationships:
 *   ----------------------------------------
 *     Owner: Ada (7)
 */

import { OutputStream } from '../types/cli';

export interface DetailField<TDetail> {
  label: string;
  value: (detail: TDetail) => string;
  /** Print the line even when the value is empty. */
  always?: boolean;
}

export interface DetailSection<TDetail> {
  title: string;
  fields: readonly DetailField<TDetail>[];
}

export interface DetailLayout<TDetail> {
  fields: readonly DetailField<TDetail>[];
  sections?: readonly DetailSection<TDetail>[];
}

const SECTION_RULE = '-'.repeat(40);

export function writeDetails<TDetail>(out: OutputStream, layout: DetailLayout<TDetail>, detail: TDetail): void {
  for (const field of layout.fields) {
    const value = field.value(detail);
    if (value !== '' || field.always) {
      out.write(`${field.label}: ${value}\n`);
    }
  }

  for (const section of layout.sections ?? []) {
    const lines = section.fields
      .map(field => ({ label: field.label, value: field.value(detail), always: field.always }))
      .filter(line => line.value !== '' || line.always);
    if (lines.length === 0) {
      continue;
    }
    out.write(`\n${section.title}:\n${SECTION_RULE}\n`);
    for (const line of lines) {
      out.write(`  ${line.label}: ${line.value}\n`);
    }
  }
}
