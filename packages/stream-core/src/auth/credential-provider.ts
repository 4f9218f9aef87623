import { errorMessage } from '../errors';

export interface CredentialProvider {
  /** Resolves to a full `Authorization` header value, or `null` when signed out. */
  getAuthorizationHeader(): Promise<string | null>;
}

export function createStaticCredentialProvider(token: string | undefined): CredentialProvider {
  const trimmed = token?.trim() ?? '';
  return {
    async getAuthorizationHeader() {
      return trimmed ? `Bearer ${trimmed}` : null;
    },
  };
}

/**
 * Asks `provider` once and gives up after `waitMs`; a slow or failing provider
 * yields `null` so the request can go out unauthenticated.
 */
export async function resolveAuthorizationHeader(
  provider: CredentialProvider | undefined,
  waitMs: number,
): Promise<string | null> {
  if (!provider) {
    return null;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<null>((resolve) => {
    timer = setTimeout(() => {
      console.info('[ariachat][auth] credential lookup timed out; continuing unauthenticated', { waitMs });
      resolve(null);
    }, waitMs);
  });

  try {
    return await Promise.race([provider.getAuthorizationHeader(), deadline]);
  } catch (error) {
    console.warn('[ariachat][auth] credential lookup failed; continuing unauthenticated', {
      error: errorMessage(error),
    });
    return null;
  } finally {
    clearTimeout(timer);
  }
}
