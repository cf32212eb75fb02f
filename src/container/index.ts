/**
 * @fileoverview Composition root. `composeContainer` registers the host's
 * collaborators and the core services on a container, once per container.
 * @module src/container
 */
import 'reflect-metadata';
import { container, type DependencyContainer } from 'tsyringe';

import {
  type HostCollaborators,
  registerCollaborators,
} from '@/container/registrations/collaborators.js';
import { registerCoreServices } from '@/container/registrations/core.js';

const composedContainers = new WeakSet<DependencyContainer>();

/**
 * Composes `target` (the global container by default). Calling it again for
 * the same container is a no-op.
 */
export function composeContainer(
  collaborators: HostCollaborators,
  target: DependencyContainer = container,
): DependencyContainer {
  if (composedContainers.has(target)) {
    return target;
  }

  registerCollaborators(target, collaborators);
  registerCoreServices(target, collaborators.env);

  composedContainers.add(target);
  return target;
}

export type { HostCollaborators } from '@/container/registrations/collaborators.js';
export * from '@/container/tokens.js';
export default container;
