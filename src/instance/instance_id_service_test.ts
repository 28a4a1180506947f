import { describe, expect, it } from "vitest";
import { InstanceIdService } from "./instance_id_service.ts";

describe("InstanceIdService", () => {
  it("generates a UUID that stays stable for the instance", () => {
    const service = new InstanceIdService();

    expect(service.getId()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
    expect(service.getId()).toBe(service.getId());
  });

  it("gives separate instances separate ids", () => {
    expect(new InstanceIdService().getId()).not.toBe(new InstanceIdService().getId());
  });

  it("uses a supplied id", () => {
    expect(new InstanceIdService("worker-7").getId()).toBe("worker-7");
  });
});
