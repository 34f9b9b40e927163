import { LineDetector } from '../line-detector.js';

const STATEMENT = /^(CREATE|ALTER|DROP|INSERT|UPDATE|DELETE|SELECT|WITH|GRANT|REVOKE|BEGIN|COMMIT|MERGE)\b/i;

const OBJECT_TARGET =
  /^\w+\s+(?:OR\s+REPLACE\s+)?(?:(?:UNIQUE|TEMP|TEMPORARY|MATERIALIZED)\s+)*(?:TABLE|VIEW|INDEX|FUNCTION|PROCEDURE|TRIGGER|TYPE|SEQUENCE|SCHEMA|DATABASE)\s+(?:IF\s+(?:NOT\s+)?EXISTS\s+)?([\w."`[\]]+)/i;
const ROW_TARGET = /^(?:INSERT\s+INTO|DELETE\s+FROM|UPDATE|MERGE\s+INTO)\s+([\w."`[\]]+)/i;

export function sqlStatementName(line: string): string | null {
  const verb = STATEMENT.exec(line)?.[1];
  if (!verb) return null;

  const target = OBJECT_TARGET.exec(line)?.[1] ?? ROW_TARGET.exec(line)?.[1];
  const label = verb.toUpperCase();
  return target ? `${label} ${target.replace(/["`[\]]/g, '')}` : label;
}

/**
 * One span per column-zero statement; statement bodies are not brace-delimited.
 */
export class SqlDetector extends LineDetector {
  readonly language = 'sql';
  protected readonly extensions = ['.sql'] as const;
  protected readonly braceDelimited = false;

  protected matchDeclaration(line: string): string | null {
    return sqlStatementName(line);
  }
}
