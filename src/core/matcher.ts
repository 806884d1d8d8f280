import { MatchLine } from '../common/interfaces/rules.interface';

/**
 * Tests a message blob against a single matcher.
 * Matching is case-sensitive and unanchored. Regex matchers run in multiline
 * mode, so `^` and `$` anchor to each line and `.` stops at line breaks, the
 * same way a line-by-line grep would.
 */
export function matchLine(text: string, matcher: MatchLine): boolean {
  if (!text || !matcher) return false;

  if (typeof matcher === 'string') {
    return text.includes(matcher);
  }

  if (!matcher.value) return false;

  return matcher.type === 'regex'
    ? new RegExp(matcher.value, 'm').test(text)
    : text.includes(matcher.value);
}

export function matchesAny(text: string, matchers: MatchLine[]): boolean {
  return matchers.some((matcher) => matchLine(text, matcher));
}
