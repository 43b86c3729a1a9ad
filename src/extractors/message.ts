/**
 * Message Parsing
 * Pulls names out of error messages and fault lines
 */

/** Text between the first pair of matching quote characters */
const QUOTED = /(['"`])(.*?)\1/;

/** "<expr>.<member> is not a function" */
const MISSING_METHOD = /\.([\w$]+) is not a function\b/;

/** "<name> is not defined" */
const UNDEFINED_NAME = /^([\w$]+) is not defined\b/;

/** First bracket expression of a line, e.g. `items[5]` */
const BRACKET_EXPRESSION = /\[([^\]]*)\]/;

/**
 * Text between the first pair of quotes, or undefined when the message
 * has no quoted text.
 */
export function parseQuotedText(message: string): string | undefined {
  return QUOTED.exec(message)?.[2];
}

/**
 * Missing key of a lookup failure: the first quoted text, or the whole
 * message with surrounding quotes removed.
 */
export function parseMissingKey(message: string): string {
  return parseQuotedText(message) ?? message.replace(/^['"`]+|['"`]+$/g, '');
}

/** Whether a message reports a call of a method the receiver lacks */
export function isMissingMethodMessage(message: string): boolean {
  return MISSING_METHOD.test(message);
}

/** Missing member of a failed lookup or method call */
export function parseMissingMember(message: string): string | undefined {
  return parseQuotedText(message) ?? MISSING_METHOD.exec(message)?.[1];
}

/** Identifier of a failed name resolution */
export function parseUndefinedName(message: string): string | undefined {
  return parseQuotedText(message) ?? UNDEFINED_NAME.exec(message)?.[1];
}

/**
 * Index expression written inside the first brackets of a line.
 *
 * @returns Trimmed expression, or null when the line has none
 */
export function parseAttemptedIndex(line: string): string | null {
  const expression = BRACKET_EXPRESSION.exec(line)?.[1]?.trim();
  return expression === undefined || expression === '' ? null : expression;
}
