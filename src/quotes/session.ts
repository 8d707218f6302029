/**
 * session.ts
 *
 * Scoped acquisition for the browser: whatever happens inside use(),
 * release() runs before the result (or the error) is handed back.
 */

export async function withResource<R, T>(
  acquire: () => Promise<R>,
  release: (resource: R) => Promise<void>,
  use: (resource: R) => Promise<T>,
): Promise<T> {
  const resource = await acquire();
  try {
    return await use(resource);
  } finally {
    await release(resource);
  }
}
