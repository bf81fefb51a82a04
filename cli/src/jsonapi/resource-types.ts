/**
 * Resource type names.
 *
 * Users type resource kinds in many spellings ("customer", "customers",
 * "Customer", "material_suppliers"). Filters expect the class name
 * (`Customer|123`) while request bodies expect the JSON:API type
 * (`customers`). Every command converts through this module.
 */

import { ValidationError } from '../utils/error-handler';

// Words whose singular and plural are the same
const UNCOUNTABLE = new Set(['equipment', 'information', 'feedback']);

// Spellings the suffix rules get wrong, keyed by lower-case kebab form
const IRREGULAR_CLASS_NAMES: Record<string, string> = {
  people: 'Person',
  person: 'Person',
  org: 'Organization',
  orgs: 'Organization'
};

export interface TypedRef {
  className: string;
  type: string;
  id: string;
}

function singularize(word: string): string {
  if (UNCOUNTABLE.has(word)) return word;
  if (/[^aeiou]ies$/.test(word)) return word.slice(0, -3) + 'y';
  if (/(sses|shes|ches|xes|uses)$/.test(word)) return word.slice(0, -2);
  if (/(ss|us|is)$/.test(word)) return word;
  if (word.length > 1 && word.endsWith('s')) return word.slice(0, -1);
  return word;
}

function pluralize(word: string): string {
  if (UNCOUNTABLE.has(word)) return word;
  if (/[^aeiou]y$/.test(word)) return word.slice(0, -1) + 'ies';
  if (/(s|x|ch|sh)$/.test(word)) return word + 'es';
  return word + 's';
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function splitWords(value: string): string[] {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .split(/[-_\s]+/)
    .map(part => part.toLowerCase())
    .filter(part => part !== '');
}

/**
 * Class name used by polymorphic filters: "customers" -> "Customer",
 * "material-suppliers" -> "MaterialSupplier", "Brokers" -> "Broker". Camel-case
 * input is split into words the same way, so the last word is always singular.
 */
export function toClassName(value: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    return '';
  }
  const irregular = IRREGULAR_CLASS_NAMES[trimmed.toLowerCase()];
  if (irregular) {
    return irregular;
  }
  const words = splitWords(trimmed);
  if (words.length === 0) {
    return '';
  }
  words[words.length - 1] = singularize(words[words.length - 1]);
  return words.map(capitalize).join('');
}

/**
 * JSON:API type used in request bodies and paths: "Customer" -> "customers",
 * "material_supplier" -> "material-suppliers".
 */
export function toJsonApiType(value: string): string {
  const className = toClassName(value);
  if (className === '') {
    return '';
  }
  const words = splitWords(className);
  words[words.length - 1] = pluralize(words[words.length - 1]);
  return words.join('-');
}

/** Singular kebab-case form: "MaterialSupplier" -> "material-supplier". */
export function toSingularKebab(value: string): string {
  return splitWords(toClassName(value)).join('-');
}

/**
 * Parse a polymorphic reference written as "Type|ID".
 */
export function parseTypedRef(value: string, flag: string): TypedRef {
  const parts = value.split('|');
  if (parts.length !== 2 || parts[0].trim() === '' || parts[1].trim() === '') {
    throw new ValidationError(`${flag} must be in Type|ID format (e.g. Customer|123)`);
  }
  const className = toClassName(parts[0]);
  return { className, type: toJsonApiType(className), id: parts[1].trim() };
}

/** Filter value for a polymorphic reference: "customers|5" -> "Customer|5". */
export function formatTypedFilter(value: string, flag: string): string {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item !== '')
    .map(item => {
      const ref = parseTypedRef(item, flag);
      return `${ref.className}|${ref.id}`;
    })
    .join(',');
}
