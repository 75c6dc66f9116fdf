import { ParameterError, Result, failure } from './errors.js';

/**
 * Components of a package version: `[epoch:]upstream[-revision]`
 */
export interface PackageVersion {
  /** Epoch number, 0 when absent */
  epoch: number;

  upstream: string;

  /** Debian revision, after the last hyphen */
  revision?: string;
}

const EPOCH_PATTERN = /^\d*$/;

/**
 * Split a version string into its components. The epoch runs up to the
 * first colon and must be numeric (an empty epoch is 0); the revision
 * follows the last hyphen.
 */
export function parseVersion(text: string): Result<PackageVersion> {
  let epoch = 0;
  let rest = text;

  const colon = text.indexOf(':');
  if (colon !== -1) {
    const epochText = text.slice(0, colon);
    if (!EPOCH_PATTERN.test(epochText)) {
      return failure(new ParameterError(`Version epoch '${epochText}' is not a number`));
    }
    epoch = epochText === '' ? 0 : Number(epochText);
    if (!Number.isSafeInteger(epoch)) {
      return failure(new ParameterError(`Version epoch '${epochText}' is too large`));
    }
    rest = text.slice(colon + 1);
  }

  const hyphen = rest.lastIndexOf('-');
  if (hyphen === -1) {
    return { ok: true, value: { epoch, upstream: rest } };
  }

  return {
    ok: true,
    value: {
      epoch,
      upstream: rest.slice(0, hyphen),
      revision: rest.slice(hyphen + 1)
    }
  };
}

export function formatVersion(version: PackageVersion): string {
  const epoch = version.epoch > 0 ? `${version.epoch}:` : '';
  const revision = version.revision !== undefined ? `-${version.revision}` : '';
  return `${epoch}${version.upstream}${revision}`;
}
