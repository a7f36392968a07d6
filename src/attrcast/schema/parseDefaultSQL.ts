// schema/parseDefaultSQL.ts

import { NO_DEFAULT } from "../defaults.js";

const QUOTED = /^'((?:[^']|'')*)'(?:::[\w\s".[\]]+)?$/;
const NUMBER = /^\(?(-?\d+(?:\.\d+)?)\)?(?:::[\w\s".]+)?$/;
const BOOLEAN = /^(true|false)$/i;
const NULL = /^NULL(?:::[\w\s".[\]]+)?$/i;

/**
 * Turn a column_default expression into a storage-form literal.
 *
 *   'abc'::character varying  -> "abc"
 *   '{a,b}'::text[]           -> "{a,b}"
 *   42 / (-1.5)::numeric      -> "42" / "-1.5"
 *   true                      -> "true"
 *
 * Anything computed by the database (now(), gen_random_uuid(), nextval(...))
 * and NULL yield NO_DEFAULT.
 */
export function parseDefaultSQL(expr: string | null | undefined): unknown {
  if (expr === null || expr === undefined) return NO_DEFAULT;

  const text = expr.trim();
  if (NULL.test(text)) return NO_DEFAULT;

  const quoted = QUOTED.exec(text);
  if (quoted) return (quoted[1] ?? "").replace(/''/g, "'");

  const number = NUMBER.exec(text);
  if (number) return number[1];

  if (BOOLEAN.test(text)) return text.toLowerCase();

  return NO_DEFAULT;
}
