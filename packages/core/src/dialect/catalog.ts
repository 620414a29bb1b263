/**
 * Static dialect catalog: name normalization and the capability brief
 * handed to the generation prompt.
 */

export type KnownDialect = 'postgresql' | 'mysql' | 'sqlite' | 'mssql' | 'oracle';

export interface FeatureSet {
  supportsWindowFunctions: boolean;
  supportsCTEs: boolean;
  supportsJSON: boolean;
  supportsArrays: boolean;
  dateFunctions: readonly string[];
  stringFunctions: readonly string[];
  aggregateFunctions: readonly string[];
}

const ALIASES: Record<string, string> = {
  postgres: 'postgresql',
  postgresql: 'postgresql',
  pg: 'postgresql',
  mysql: 'mysql',
  mariadb: 'mysql',
  sqlite: 'sqlite',
  sqlite3: 'sqlite',
  mssql: 'mssql',
  sqlserver: 'mssql',
  oracle: 'oracle',
};

const KNOWN: ReadonlySet<string> = new Set<KnownDialect>(['postgresql', 'mysql', 'sqlite', 'mssql', 'oracle']);

/** Lowercases and maps common aliases; unlisted names pass through lowercased. */
export function normalizeDialect(name: string): string {
  const lower = name.trim().toLowerCase();
  return ALIASES[lower] ?? lower;
}

export function isKnownDialect(name: string): name is KnownDialect {
  return KNOWN.has(name);
}

const BASE_AGGREGATES = ['SUM', 'AVG', 'MIN', 'MAX', 'COUNT'] as const;

const FEATURES: Record<KnownDialect, FeatureSet> = {
  postgresql: {
    supportsWindowFunctions: true,
    supportsCTEs: true,
    supportsJSON: true,
    supportsArrays: true,
    dateFunctions: ['DATE_TRUNC', 'EXTRACT', 'TO_CHAR'],
    stringFunctions: ['LOWER', 'UPPER', 'TRIM', 'SUBSTRING', 'REGEXP_REPLACE'],
    aggregateFunctions: [...BASE_AGGREGATES, 'ARRAY_AGG', 'STRING_AGG'],
  },
  mysql: {
    supportsWindowFunctions: true,
    supportsCTEs: true,
    supportsJSON: true,
    supportsArrays: false,
    dateFunctions: ['DATE_FORMAT', 'EXTRACT', 'DATE_ADD', 'DATE_SUB'],
    stringFunctions: ['LOWER', 'UPPER', 'TRIM', 'SUBSTRING', 'REGEXP_REPLACE'],
    aggregateFunctions: [...BASE_AGGREGATES, 'GROUP_CONCAT'],
  },
  sqlite: {
    supportsWindowFunctions: false,
    supportsCTEs: false,
    supportsJSON: false,
    supportsArrays: false,
    dateFunctions: ['STRFTIME', 'DATE', 'TIME', 'DATETIME'],
    stringFunctions: ['LOWER', 'UPPER', 'TRIM', 'SUBSTR', 'REPLACE'],
    aggregateFunctions: [...BASE_AGGREGATES, 'GROUP_CONCAT'],
  },
  mssql: {
    supportsWindowFunctions: true,
    supportsCTEs: true,
    supportsJSON: true,
    supportsArrays: false,
    dateFunctions: ['DATEPART', 'DATEADD', 'DATEDIFF', 'FORMAT'],
    stringFunctions: ['LOWER', 'UPPER', 'TRIM', 'SUBSTRING', 'REPLACE'],
    aggregateFunctions: [...BASE_AGGREGATES, 'STRING_AGG'],
  },
  oracle: {
    supportsWindowFunctions: true,
    supportsCTEs: true,
    supportsJSON: true,
    supportsArrays: false,
    dateFunctions: ['TO_CHAR', 'EXTRACT', 'ADD_MONTHS', 'MONTHS_BETWEEN'],
    stringFunctions: ['LOWER', 'UPPER', 'TRIM', 'SUBSTR', 'REPLACE', 'REGEXP_REPLACE'],
    aggregateFunctions: [...BASE_AGGREGATES, 'LISTAGG'],
  },
};

// Unlisted dialects still get a generation attempt, so assume everything works.
const PERMISSIVE: FeatureSet = {
  supportsWindowFunctions: true,
  supportsCTEs: true,
  supportsJSON: true,
  supportsArrays: true,
  dateFunctions: [],
  stringFunctions: [],
  aggregateFunctions: [...BASE_AGGREGATES],
};

export function featureSet(dialect: string): FeatureSet {
  const normalized = normalizeDialect(dialect);
  return isKnownDialect(normalized) ? FEATURES[normalized] : PERMISSIVE;
}

/** One-paragraph capability brief for prompts. */
export function describeFeatures(dialect: string): string {
  const f = featureSet(dialect);
  const yesNo = (flag: boolean): string => (flag ? 'yes' : 'no');
  const list = (items: readonly string[]): string => (items.length > 0 ? items.join(', ') : 'standard SQL only');
  return [
    `Dialect: ${normalizeDialect(dialect)}`,
    `- Window functions: ${yesNo(f.supportsWindowFunctions)}`,
    `- Common table expressions: ${yesNo(f.supportsCTEs)}`,
    `- JSON operators: ${yesNo(f.supportsJSON)}`,
    `- Array types: ${yesNo(f.supportsArrays)}`,
    `- Date functions: ${list(f.dateFunctions)}`,
    `- String functions: ${list(f.stringFunctions)}`,
    `- Aggregate functions: ${list(f.aggregateFunctions)}`,
  ].join('\n');
}
