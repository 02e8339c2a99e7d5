import { RepositorySource } from '../types';
import { InvalidRepositoryUrlError, Result, err, ok } from '../utils/error-handling';

/**
 * Derives owner and repository name from a clone URL.
 * Handles `https://host/owner/name(.git)`, trailing slashes and scp-style `git@host:owner/name.git`.
 */
export function parseRepositorySource(cloneUrl: string): Result<RepositorySource, InvalidRepositoryUrlError> {
  const trimmed = cloneUrl.trim().replace(/\/+$/, '');
  const withoutScheme = trimmed.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '');
  // scp-style remotes separate host and path with a colon
  const normalized = /^[^/@]+@[^/:]+:/.test(withoutScheme) ? withoutScheme.replace(':', '/') : withoutScheme;
  // host, owner and name at the very least
  const segments = normalized.split('/').filter(segment => segment !== '');

  if (segments.length < 3) {
    return err(new InvalidRepositoryUrlError(cloneUrl));
  }

  const name = segments[segments.length - 1].replace(/\.git$/, '');
  const owner = segments[segments.length - 2];

  if (!name || !owner) {
    return err(new InvalidRepositoryUrlError(cloneUrl));
  }

  return ok({ cloneUrl: cloneUrl.trim(), owner, name });
}
