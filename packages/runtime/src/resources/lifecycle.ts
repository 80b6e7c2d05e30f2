import { type RuntimeResource } from '@kiln/core';

/** Drops missing and repeated entries, keeping first-seen order. */
export function collectLifecycleResources(ordered: Array<RuntimeResource | undefined>): RuntimeResource[] {
  const unique = new Set<RuntimeResource>();
  for (const candidate of ordered) {
    if (candidate) {
      unique.add(candidate);
    }
  }
  return [...unique];
}

/**
 * Starts resources in order. If one fails, the ones already started are
 * closed in reverse before the error is rethrown.
 */
export async function startResources(resources: RuntimeResource[]): Promise<void> {
  const started: RuntimeResource[] = [];
  for (const resource of resources) {
    try {
      await resource.start?.();
    } catch (error) {
      await closeResources([...started, resource]);
      throw error;
    }
    started.push(resource);
  }
}

export async function closeResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of [...resources].reverse()) {
    await resource.close?.();
  }
}
