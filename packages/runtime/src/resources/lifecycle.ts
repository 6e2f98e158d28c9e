import { type RuntimeResource } from '@glimpse/core';

export function collectLifecycleResources(candidates: Array<RuntimeResource | undefined>): RuntimeResource[] {
  const unique = new Set<RuntimeResource>();
  for (const candidate of candidates) {
    if (candidate) {
      unique.add(candidate);
    }
  }

  return [...unique];
}

export async function startResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of resources) {
    await resource.start?.();
  }
}

export async function closeResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of [...resources].reverse()) {
    await resource.close?.();
  }
}
