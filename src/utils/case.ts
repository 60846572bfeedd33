/**
 * SCREAMING_SNAKE enum names as printed by `temporal -o json`
 */

/** ACTIVITY_TASK_FAILED -> ActivityTaskFailed */
export function screamingToPascal(text: string): string {
  return text
    .toLowerCase()
    .split('_')
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join('');
}

/**
 * Strip an enum prefix and convert to PascalCase
 * Text that is not in SCREAMING_SNAKE form is returned unchanged.
 */
export function enumName(text: string, prefix: string): string {
  if (text.startsWith(prefix)) {
    return screamingToPascal(text.slice(prefix.length));
  }
  return /^[A-Z0-9_]+$/.test(text) ? screamingToPascal(text) : text;
}
