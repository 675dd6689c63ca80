import { describe, expect, it } from "vitest";
import { FakeProxmoxApi, silentLogger } from "../testing/fake-api.js";
import { listContainers, mergeStats, renderContainers, type ContainerRow } from "./stats.js";

const GIB = 1024 ** 3;
const MIB = 1024 ** 2;

describe("mergeStats", () => {
  it("takes live usage from status and limits from config", () => {
    const stats = mergeStats(
      { cpu: 0.1234, mem: 256 * MIB, maxmem: 1 * GIB },
      { cores: 2, memory: 1024, swap: 512 },
      null
    );
    expect(stats).toEqual({
      cores: 2,
      memory: 1024,
      cpu_pct: 12.34,
      mem_bytes: 256 * MIB,
      maxmem_bytes: GIB,
      mem_pct: 25,
      unlimited_memory: false,
    });
  });

  it("falls back to the RRD sample for zero readings", () => {
    const stats = mergeStats({ cpu: 0, mem: 0, maxmem: 0 }, { cores: 1 }, {
      cpuPct: 3.5,
      memBytes: 128 * MIB,
      maxmemBytes: 512 * MIB,
    });
    expect(stats.cpu_pct).toBe(3.5);
    expect(stats.mem_bytes).toBe(128 * MIB);
    expect(stats.maxmem_bytes).toBe(512 * MIB);
    expect(stats.memory).toBe(512);
    expect(stats.mem_pct).toBe(25);
  });

  it("keeps live readings that are already non-zero", () => {
    const stats = mergeStats({ cpu: 0.5, mem: MIB, maxmem: 2 * MIB }, { memory: 2 }, {
      cpuPct: 99,
      memBytes: 7,
      maxmemBytes: 9,
    });
    expect(stats.cpu_pct).toBe(50);
    expect(stats.mem_bytes).toBe(MIB);
    expect(stats.maxmem_bytes).toBe(2 * MIB);
  });

  it("reads the memory limit from alternative config keys", () => {
    expect(mergeStats({}, { ram: 768 }, null).memory).toBe(768);
    expect(mergeStats({}, { maxmem: "4096" }, null).memory).toBe(4096);
    expect(mergeStats({}, { memoryMiB: 256 }, null).memory).toBe(256);
  });

  it("uses a positive cpulimit when cores is unset", () => {
    expect(mergeStats({}, { cpulimit: 1.5 }, null).cores).toBe(1.5);
    expect(mergeStats({}, { cpulimit: 0 }, null).cores).toBeNull();
  });

  it("flags memory as unlimited when neither swap nor memory is configured", () => {
    expect(mergeStats({}, {}, null).unlimited_memory).toBe(true);
    expect(mergeStats({}, { swap: 0, memory: 0 }, null).unlimited_memory).toBe(true);
    expect(mergeStats({}, { swap: 512 }, null).unlimited_memory).toBe(false);
    expect(mergeStats({}, { memory: 512 }, null).unlimited_memory).toBe(false);
  });

  it("leaves the memory percentage unset without a limit", () => {
    expect(mergeStats({ mem: MIB }, {}, null).mem_pct).toBeNull();
  });
});

describe("listContainers", () => {
  const logger = silentLogger();

  it("fetches RRD data only when a live reading is zero", async () => {
    const api = new FakeProxmoxApi({
      "get /nodes/pve1/lxc": [
        { vmid: 100, name: "web", status: "running" },
        { vmid: 101, name: "idle", status: "stopped" },
      ],
      "get /nodes/pve1/lxc/100/status/current": { cpu: 0.02, mem: 64 * MIB, maxmem: 512 * MIB },
      "get /nodes/pve1/lxc/100/config": { cores: 1, memory: 512, swap: 512 },
      "get /nodes/pve1/lxc/101/status/current": { cpu: 0, mem: 0, maxmem: 0 },
      "get /nodes/pve1/lxc/101/config": { cores: 2, memory: 1024 },
      "get /nodes/pve1/lxc/101/rrddata": [
        { cpu: 0.5, mem: 10, maxmem: 20 },
        { cpu: 0.01, mem: 32 * MIB, maxmem: 1024 * MIB },
      ],
    });

    const rows = await listContainers(api, { node: "pve1", includeStats: true, includeRaw: false, concurrency: 2, logger });

    expect(api.callsTo("get", "/nodes/pve1/lxc/100/rrddata")).toEqual([]);
    expect(api.callsTo("get", "/nodes/pve1/lxc/101/rrddata")).toEqual([
      { method: "get", endpoint: "/nodes/pve1/lxc/101/rrddata", data: { timeframe: "hour", cf: "AVERAGE" } },
    ]);
    expect(rows[1]).toEqual({
      vmid: "101",
      name: "idle",
      node: "pve1",
      status: "stopped",
      cores: 2,
      memory: 1024,
      cpu_pct: 1,
      mem_bytes: 32 * MIB,
      maxmem_bytes: 1024 * MIB,
      mem_pct: 3.13,
      unlimited_memory: false,
    });
  });

  it("lists bare rows without stats", async () => {
    const api = new FakeProxmoxApi({ "get /nodes/pve1/lxc": [{ vmid: 100, hostname: "web", status: "running" }] });

    const rows = await listContainers(api, { node: "pve1", includeStats: false, includeRaw: true, concurrency: 2, logger });

    expect(rows).toEqual([{ vmid: "100", name: "web", node: "pve1", status: "running" }]);
    expect(api.calls).toHaveLength(1);
  });

  it("attaches raw status and config on request", async () => {
    const status = { cpu: 0.1, mem: 1, maxmem: 2, uptime: 60 };
    const config = { memory: 1, swap: 0, hostname: "web" };
    const api = new FakeProxmoxApi({
      "get /nodes/pve1/lxc": [{ vmid: 100, name: "web" }],
      "get /nodes/pve1/lxc/100/status/current": status,
      "get /nodes/pve1/lxc/100/config": config,
    });

    const [row] = await listContainers(api, { node: "pve1", includeStats: true, includeRaw: true, concurrency: 1, logger });

    expect(row.raw_status).toEqual(status);
    expect(row.raw_config).toEqual(config);
  });

  it("keeps a row with zeros when status and config are unavailable", async () => {
    const api = new FakeProxmoxApi({ "get /nodes/pve1/lxc": [{ vmid: 100, name: "web", status: "unknown" }] });

    const [row] = await listContainers(api, { node: "pve1", includeStats: true, includeRaw: false, concurrency: 1, logger });

    expect(row).toMatchObject({ vmid: "100", cpu_pct: 0, mem_bytes: 0, maxmem_bytes: 0, memory: 0, unlimited_memory: true });
  });
});

describe("renderContainers", () => {
  it("renders stats, limits and the unlimited marker", () => {
    const rows: ContainerRow[] = [
      {
        vmid: "100",
        name: "web",
        node: "pve1",
        status: "running",
        cores: 2,
        memory: 1024,
        cpu_pct: 12.34,
        mem_bytes: 256 * MIB,
        maxmem_bytes: GIB,
        mem_pct: 25,
        unlimited_memory: false,
      },
      {
        vmid: "101",
        name: "free",
        node: "pve2",
        status: "stopped",
        cores: null,
        memory: 0,
        cpu_pct: 0,
        mem_bytes: 0,
        maxmem_bytes: 0,
        mem_pct: null,
        unlimited_memory: true,
      },
    ];

    expect(renderContainers(rows)).toBe(
      [
        "📦 Containers",
        "",
        "📦 web (ID: 100)",
        "  • Status: RUNNING",
        "  • Node: pve1",
        "  • CPU: 12.3%",
        "  • CPU Cores: 2",
        "  • Memory: 256.00 MiB / 1.00 GiB (25.0%)",
        "",
        "📦 free (ID: 101)",
        "  • Status: STOPPED",
        "  • Node: pve2",
        "  • CPU: 0.0%",
        "  • CPU Cores: N/A",
        "  • Memory: 0.00 B (unlimited)",
      ].join("\n")
    );
  });

  it("shows a zero limit when memory is capped but unknown", () => {
    const row: ContainerRow = {
      vmid: "5",
      name: "x",
      node: "pve1",
      status: "running",
      cores: 1,
      memory: 0,
      cpu_pct: 1,
      mem_bytes: 1536,
      maxmem_bytes: 0,
      mem_pct: null,
      unlimited_memory: false,
    };
    expect(renderContainers([row])).toContain("  • Memory: 1.50 KiB / 0.00 B");
  });

  it("omits stats lines for rows without stats", () => {
    expect(renderContainers([{ vmid: "9", name: "bare", node: "pve1", status: null }])).toBe(
      ["📦 Containers", "", "📦 bare (ID: 9)", "  • Status: ", "  • Node: pve1"].join("\n")
    );
  });

  it("reports an empty list", () => {
    expect(renderContainers([])).toBe("📦 Containers\n\nNo containers found");
  });
});
