/**
 * Phrasings that hand the developer a decision instead of asking about it.
 *
 * Sentence-initial imperatives only match at the start of a line, after a list
 * marker, or after sentence punctuation, so "you can use" does not trip them.
 */
export const DECISIVE_PHRASE_PATTERNS: readonly RegExp[] = [
  /(?:^|[.!;:]\s+)(?:(?:[-*+]|\d{1,9}[.)])\s+)?(?:just\s+|always\s+|never\s+)?(?:use|go\s+with|choose|pick|switch\s+to|adopt|stick\s+with|migrate\s+to|implement|install)\b[^.!?\n]*/im,
  /\byou\s+(?:should|must|need\s+to|have\s+to|['’]ll\s+want\s+to|will\s+want\s+to)\b[^.!?\n]*/i,
  /\b(?:I|we)(?:['’]d|\s+would)?\s+(?:recommend|suggest)\b[^.!?\n]*/i,
  /\bthe\s+(?:best|right|correct|only)\s+(?:approach|option|choice|way|solution|pattern)\s+is\b[^.!?\n]*/i,
  /\blet['’]s\s+(?:use|go\s+with|implement)\b[^.!?\n]*/i,
];

/**
 * Phrasings that announce a finished solution.
 */
export const COMPLETE_SOLUTION_PATTERNS: readonly RegExp[] = [
  /\bhere(?:['’]s|\s+is|\s+are)\s+(?:the|a|your)\s+(?:complete|full|final|finished|working|entire|fixed)\s+(?:implementation|solution|code|version|fix|program|script)s?\b/i,
  /\bI(?:['’]ve|\s+have)\s+(?:written|implemented|rewritten|fixed|refactored|finished)\b/i,
];

/**
 * Test-framework constructs that mark a code block as a test suite.
 */
export const TEST_CONSTRUCT_PATTERNS: readonly RegExp[] = [
  /\b(?:describe|it|test)\s*\(\s*['"`]/,
  /\bexpect\s*\(/,
  /\bassert(?:Equal|Equals|True|False|That|_eq)?!?\s*[.(]/,
  /^\s*(?:async\s+)?def\s+test_\w*/m,
  /@Test\b/,
  /#\[test\]/,
  /\bfunc\s+Test\w*\s*\(/,
];

/**
 * Code content that handles security-sensitive material.
 */
export const SECURITY_SENSITIVE_CODE_PATTERNS: readonly RegExp[] = [
  /passw(?:or)?d/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /\bjwt/i,
  /bcrypt|argon2|scrypt/i,
  /encrypt|decrypt|cipher/i,
  /private[_-]?key/i,
  /credential/i,
  /session/i,
  /cookie/i,
  /csrf/i,
  /\blogin/i,
  /authenticat|authoriz/i,
  /innerHTML/,
  /\beval\s*\(/,
  /\bSELECT\b[\s\S]*\bFROM\b/i,
];

/**
 * Terms showing that a question raises the security side of the work.
 */
export const SECURITY_QUESTION_PATTERN =
  /secur|threat|attack|risk|trust|vulnerab|leak|expos|saniti[sz]|validat|encrypt|passw|token|secret|credential|auth|permission|privacy|inject/i;
