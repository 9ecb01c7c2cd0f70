/**
 * Remote URL helpers: recognition, checkout naming, identity comparison
 */

const SCHEME_URL_REGEX = /^(?:https?|ssh|git):\/\/\S+$/;
// user@host:path, e.g. git@github.com:org/repo.git
const SCP_URL_REGEX = /^[\w.-]+@[\w.-]+:[^\s/][^\s]*$/;

export function isRemoteUrl(value: string): boolean {
  return SCHEME_URL_REGEX.test(value) || SCP_URL_REGEX.test(value);
}

// Trailing slashes, a trailing `/.git` directory, then a `.git` suffix, as `git clone` strips them
function stripRepositorySuffix(url: string): string {
  return url
    .trim()
    .replace(/\/+$/, '')
    .replace(/\/\.git$/, '')
    .replace(/\/+$/, '')
    .replace(/\.git$/, '');
}

/**
 * Directory name `git clone` picks for a URL: last path segment without `.git`.
 * May be empty or a dot segment for URLs that do not name a repository.
 */
export function repositoryName(url: string): string {
  const stripped = stripRepositorySuffix(url);
  const segments = stripped.split(/[/:]/);
  return segments[segments.length - 1] ?? stripped;
}

/**
 * Whether a name stays a single entry inside its parent directory
 */
export function isCheckoutName(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && !name.includes('\\');
}

export function sameRemote(a: string, b: string): boolean {
  return stripRepositorySuffix(a) === stripRepositorySuffix(b);
}
