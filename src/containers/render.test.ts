import { describe, expect, it } from "vitest";
import type { ActionResult } from "./batch.js";
import { renderActionLine, renderActionResults } from "./render.js";

const results: ActionResult[] = [
  { ok: true, node: "pve1", vmid: 101, name: "web", message: "UPID:pve1:0001" },
  { ok: false, node: "pve2", vmid: 102, name: "db", error: "CT 102 is locked" },
  { ok: true, node: "pve1", vmid: 103, name: "cache", message: null },
];

describe("renderActionLine", () => {
  it("shows the task id of a success", () => {
    expect(renderActionLine(results[0])).toBe("✅ OK web (ID: 101, node: pve1) - UPID:pve1:0001");
  });

  it("shows the error of a failure", () => {
    expect(renderActionLine(results[1])).toBe("❌ FAIL db (ID: 102, node: pve2) - CT 102 is locked");
  });

  it("omits the detail when there is none", () => {
    expect(renderActionLine(results[2])).toBe("✅ OK cache (ID: 103, node: pve1)");
  });

  it("falls back to ct-<vmid> for an empty name", () => {
    expect(renderActionLine({ ok: true, node: "pve1", vmid: 7, name: "", message: null })).toBe(
      "✅ OK ct-7 (ID: 7, node: pve1)"
    );
  });
});

describe("renderActionResults", () => {
  it("renders a titled report in pretty mode", () => {
    expect(renderActionResults("Start Containers", results, "pretty")).toBe(
      [
        "📦 Start Containers",
        "",
        "✅ OK web (ID: 101, node: pve1) - UPID:pve1:0001",
        "❌ FAIL db (ID: 102, node: pve2) - CT 102 is locked",
        "✅ OK cache (ID: 103, node: pve1)",
      ].join("\n")
    );
  });

  it("renders sorted-key JSON in json mode", () => {
    const json = renderActionResults("Start Containers", results.slice(0, 2), "json");
    expect(json).toBe(
      [
        "[",
        "  {",
        '    "message": "UPID:pve1:0001",',
        '    "name": "web",',
        '    "node": "pve1",',
        '    "ok": true,',
        '    "vmid": 101',
        "  },",
        "  {",
        '    "error": "CT 102 is locked",',
        '    "name": "db",',
        '    "node": "pve2",',
        '    "ok": false,',
        '    "vmid": 102',
        "  }",
        "]",
      ].join("\n")
    );
  });

  it("renders equal results to identical JSON whatever the key order", () => {
    const reordered: ActionResult[] = [{ vmid: 101, name: "web", message: "UPID:pve1:0001", node: "pve1", ok: true }];
    expect(renderActionResults("x", reordered, "json")).toBe(renderActionResults("y", results.slice(0, 1), "json"));
  });
});
