/**
 * Simple async-local context for build-scoped metadata (e.g., buildId).
 */
import { AsyncLocalStorage } from 'async_hooks';

export type BuildContext = {
  buildId?: string;
  mailbox?: string;
};

const storage = new AsyncLocalStorage<BuildContext>();

export function runWithBuildContext<T>(ctx: BuildContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

export function getBuildContext(): BuildContext | undefined {
  return storage.getStore();
}
