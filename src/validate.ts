/**
 * Outcome of checking a package name against Debian Policy 5.6.1
 */
export type PackageNameRule = 'valid' | 'too-short' | 'bad-prefix' | 'invalid-character';

const PREFIX_CHAR = /^[a-z0-9]$/;
const BODY_CHAR = /^[a-z0-9+.-]$/;

/**
 * Check a source or binary package name. Names are at least two characters
 * long, start with a lowercase letter or digit, and otherwise contain only
 * lowercase letters, digits, `+`, `-` and `.`.
 */
export function validatePackageName(name: string): PackageNameRule {
  if (name.length < 2) {
    return 'too-short';
  }
  if (!PREFIX_CHAR.test(name[0])) {
    return 'bad-prefix';
  }
  for (const ch of name.slice(1)) {
    if (!BODY_CHAR.test(ch)) {
      return 'invalid-character';
    }
  }
  return 'valid';
}

export function describePackageNameRule(rule: Exclude<PackageNameRule, 'valid'>): string {
  switch (rule) {
    case 'too-short':
      return 'must be at least two characters long';
    case 'bad-prefix':
      return 'must begin with a lowercase letter or a digit';
    case 'invalid-character':
      return "may only contain lowercase letters, digits, '+', '-' and '.'";
  }
}
