/**
 * Read-only query validation.
 *
 * A query is accepted when, after comments are removed, it is a single
 * statement starting with SELECT or WITH and no data- or schema-changing
 * keyword appears outside string literals and quoted identifiers.
 * @module validation
 */

import { InvalidQueryError } from '../errors/index.js';

/**
 * Leading commands accepted for export.
 */
export const ALLOWED_COMMANDS: readonly string[] = ['SELECT', 'WITH'];

/**
 * Keywords rejected anywhere in the query.
 */
export const FORBIDDEN_COMMANDS: readonly string[] = [
  'DELETE',
  'DROP',
  'TRUNCATE',
  'INSERT',
  'UPDATE',
  'ALTER',
  'CREATE',
  'GRANT',
  'REVOKE',
  'EXECUTE',
  'EXEC',
  'CALL',
  'MERGE',
  'COPY',
];

const FORBIDDEN_PATTERNS = FORBIDDEN_COMMANDS.map(cmd => ({ cmd, pattern: new RegExp(`\\b${cmd}\\b`) }));

function isQuote(char: string): boolean {
  return char === "'" || char === '"';
}

// ============================================================================
// Scanning
// ============================================================================

/**
 * Removes `--` and `/* *\/` comments outside quotes. Line comments keep
 * their terminating newline.
 */
export function stripComments(query: string): string {
  let out = '';
  let quote = '';
  let i = 0;

  while (i < query.length) {
    const char = query[i];
    const next = query[i + 1] ?? '';

    if (quote !== '') {
      out += char;
      if (char === quote) {
        if (next === quote) {
          out += next;
          i += 2;
          continue;
        }
        quote = '';
      }
      i++;
      continue;
    }

    if (isQuote(char)) {
      quote = char;
      out += char;
      i++;
      continue;
    }

    if (char === '-' && next === '-') {
      const end = query.indexOf('\n', i + 2);
      if (end === -1) {
        break;
      }
      i = end;
      continue;
    }

    if (char === '/' && next === '*') {
      const end = query.indexOf('*/', i + 2);
      if (end === -1) {
        break;
      }
      i = end + 2;
      continue;
    }

    out += char;
    i++;
  }

  return out;
}

/**
 * Splits on semicolons outside quotes; blank statements are dropped.
 */
export function splitStatements(query: string): string[] {
  const statements: string[] = [];
  let current = '';
  let quote = '';

  for (let i = 0; i < query.length; i++) {
    const char = query[i];
    if (quote !== '') {
      current += char;
      if (char === quote) {
        if (query[i + 1] === quote) {
          current += quote;
          i++;
        } else {
          quote = '';
        }
      }
      continue;
    }
    if (isQuote(char)) {
      quote = char;
      current += char;
      continue;
    }
    if (char === ';') {
      statements.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  statements.push(current);

  return statements.map(s => s.trim()).filter(s => s !== '');
}

/**
 * Replaces string literals and quoted identifiers, quotes included, with
 * spaces so that keyword matching only sees SQL text.
 */
export function blankQuoted(query: string): string {
  let out = '';
  let quote = '';

  for (let i = 0; i < query.length; i++) {
    const char = query[i];
    if (quote === '') {
      if (isQuote(char)) {
        quote = char;
        out += ' ';
      } else {
        out += char;
      }
      continue;
    }
    if (char === quote) {
      if (query[i + 1] === quote) {
        out += '  ';
        i++;
        continue;
      }
      quote = '';
    }
    out += ' ';
  }

  return out;
}

/**
 * Upper-cases and collapses whitespace.
 */
export function normalizeSql(statement: string): string {
  return statement.trim().toUpperCase().replace(/\s+/g, ' ');
}

/**
 * Leading command of a normalized statement, or '' if there is none.
 */
export function firstCommand(normalized: string): string {
  if (normalized.startsWith('WITH ')) {
    return 'WITH';
  }
  const [word = ''] = normalized.split(' ');
  return word.replace(/[;,()]+$/, '');
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks that a query is a single read-only statement.
 *
 * @throws {InvalidQueryError} Naming the rule that rejected the query
 */
export function validateQuery(query: string): void {
  if (query.trim() === '') {
    throw new InvalidQueryError('query cannot be empty');
  }

  const statements = splitStatements(stripComments(query));
  if (statements.length > 1) {
    throw new InvalidQueryError('only a single SQL statement is allowed');
  }
  if (statements.length === 0) {
    throw new InvalidQueryError('unable to identify SQL command (query contains only comments)');
  }

  const normalized = normalizeSql(statements[0]);
  const command = firstCommand(normalized);
  if (command === '') {
    throw new InvalidQueryError('unable to identify SQL command');
  }

  if (!ALLOWED_COMMANDS.includes(command)) {
    if (FORBIDDEN_COMMANDS.includes(command)) {
      throw new InvalidQueryError(`forbidden SQL command detected: ${command} (read-only mode)`);
    }
    throw new InvalidQueryError(`unsupported SQL command: ${command} (only SELECT and WITH are allowed)`);
  }

  const bare = blankQuoted(normalized);
  for (const { cmd, pattern } of FORBIDDEN_PATTERNS) {
    if (pattern.test(bare)) {
      throw new InvalidQueryError(`forbidden SQL command detected: ${cmd} (command found in query)`);
    }
  }
}

/**
 * Boolean form of {@link validateQuery}.
 */
export function isReadOnlyQuery(query: string): boolean {
  try {
    validateQuery(query);
    return true;
  } catch {
    return false;
  }
}
