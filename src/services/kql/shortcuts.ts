/**
 * Question Shortcuts
 *
 * Workspace-introspection questions answered with a fixed query, before
 * classification and without a model call.
 */

import { DOMAIN_DEFINITIONS, GENERIC_TABLES } from '../../config/domains.js';

export interface Shortcut {
  name: 'list-tables' | 'table-schema';
  query: string;
}

export const LIST_TABLES_QUERY = `search *
| distinct $table
| order by $table asc`;

const LIST_TABLES_PHRASES = ['list tables', 'show tables', 'available tables', 'tables available', 'what tables'];

const SCHEMA_WORDS = /\b(schema|columns|structure)\b/;

const DEFAULT_SCHEMA_TABLE = 'AppRequests';

/** Tables recognized in schema questions, in lookup order */
const SCHEMA_TABLES: readonly string[] = [
  ...DOMAIN_DEFINITIONS.appinsights.tables,
  ...DOMAIN_DEFINITIONS.containers.tables,
  ...GENERIC_TABLES,
];

function mentionedTable(question: string): string | undefined {
  return SCHEMA_TABLES.find((table) =>
    new RegExp(`\\b${table.toLowerCase()}\\b`).test(question)
  );
}

export function matchShortcut(question: string): Shortcut | null {
  const text = question.toLowerCase();

  if (LIST_TABLES_PHRASES.some((phrase) => text.includes(phrase))) {
    return { name: 'list-tables', query: LIST_TABLES_QUERY };
  }

  if (SCHEMA_WORDS.test(text)) {
    const table = mentionedTable(text) ?? DEFAULT_SCHEMA_TABLE;
    return { name: 'table-schema', query: `${table} | getschema | project ColumnName, ColumnType` };
  }

  return null;
}
