/**
 * Config document shape. Keys follow the JSON file format, hence snake_case.
 * Keys not listed here are ignored.
 */
export interface PassmithConfig {
  base_words: string[];
  case_variants: string[];
  separators: string[];
  decorations: {
    special_chars: string[];
    num_seq: string[];
  };
  seasons: string[];
  quarters: string[];
  /** Template groups, run in file order. Group names must not be integers. */
  patterns: Record<string, string[]>;
  transformations: Record<string, string[]>;
  policy_requirements: string[];
  /** Extra slot pools referenced by custom templates. */
  placeholders?: Record<string, string[]>;
}

const stringList = {
  type: 'array',
  items: { type: 'string' },
} as const;

const stringListMap = {
  type: 'object',
  additionalProperties: stringList,
} as const;

export const CONFIG_SCHEMA = {
  $id: 'https://passmith.local/config.schema.json',
  type: 'object',
  required: [
    'base_words',
    'case_variants',
    'separators',
    'decorations',
    'seasons',
    'quarters',
    'patterns',
    'transformations',
    'policy_requirements',
  ],
  properties: {
    base_words: stringList,
    case_variants: stringList,
    separators: stringList,
    decorations: {
      type: 'object',
      required: ['special_chars', 'num_seq'],
      properties: {
        special_chars: stringList,
        num_seq: stringList,
      },
    },
    seasons: stringList,
    quarters: stringList,
    patterns: stringListMap,
    transformations: {
      ...stringListMap,
      propertyNames: { type: 'string', minLength: 1, maxLength: 1 },
    },
    policy_requirements: stringList,
    placeholders: stringListMap,
  },
} as const;
