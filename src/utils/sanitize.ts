const UNSAFE_CHARACTERS = /[/\\:*?"<>| ]/g;

/**
 * Map an arbitrary branch or workspace name onto a single filesystem-safe
 * path segment. Each of `/ \ : * ? " < > |` and space becomes `-`.
 */
export function sanitizeName(name: string): string {
  return name.replace(UNSAFE_CHARACTERS, "-");
}
