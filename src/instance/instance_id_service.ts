import { randomUUID } from "node:crypto";

/**
 * Identity of this scheduler process.
 *
 * Schedule leases (`claimedBy`) and running jobs (`processInstanceId`) carry
 * this id. A random UUID is used unless one is passed in, e.g. by tests that
 * simulate two instances.
 *
 * @example
 * ```typescript
 * const instanceIdService = new InstanceIdService();
 * instanceIdService.getId(); // "550e8400-e29b-41d4-a716-446655440000"
 * ```
 */
export class InstanceIdService {
  private readonly instanceId: string;

  constructor(instanceId?: string) {
    this.instanceId = instanceId ?? randomUUID();
  }

  getId(): string {
    return this.instanceId;
  }
}
