import { describe, expect, it } from "vitest";
import { nodePath, storagePath, volumePath } from "./resources.js";

describe("API paths", () => {
  it("encodes node and storage names as single segments", () => {
    expect(nodePath("pve1")).toBe("/nodes/pve1");
    expect(nodePath("pve1/qemu/100")).toBe("/nodes/pve1%2Fqemu%2F100");
    expect(storagePath("pve1", "../local")).toBe("/nodes/pve1/storage/..%2Flocal");
  });

  it("encodes the volume id", () => {
    expect(volumePath("pve1", "local", "local:iso/debian.iso")).toBe(
      "/nodes/pve1/storage/local/content/local%3Aiso%2Fdebian.iso"
    );
  });
});
