import { beforeEach, describe, expect, it, vi } from "vitest";

const mem = new Map<string, string>();

vi.mock("node:fs/promises", () => {
  return {
    default: {
      readFile: vi.fn(async (p: string) => {
        const data = mem.get(p);
        if (data === undefined) throw Object.assign(new Error(`ENOENT: ${p}`), { code: "ENOENT" });
        return data;
      }),
      writeFile: vi.fn(async (p: string, data: string) => {
        mem.set(p, data);
      }),
      mkdir: vi.fn(async () => undefined),
    },
  };
});

const { readConfig, writeConfig } = await import("../src/config.js");

describe("cli config", () => {
  const configPath = "/home/test/.digest/config.json";

  beforeEach(() => {
    mem.clear();
  });

  it("writes and reads config", async () => {
    await writeConfig({ apiUrl: "http://localhost:3000", apiKey: "test-token" }, { configPath });

    const cfg = await readConfig({ configPath });
    expect(cfg).toEqual({ apiUrl: "http://localhost:3000", apiKey: "test-token" });
  });

  it("returns null when config is missing", async () => {
    const cfg = await readConfig({ configPath: "/missing/config.json" });
    expect(cfg).toBeNull();
  });

  it("returns null when required fields are missing", async () => {
    mem.set(configPath, JSON.stringify({ apiUrl: "http://localhost:3000" }) + "\n");

    const cfg = await readConfig({ configPath });
    expect(cfg).toBeNull();
  });

  it("throws on malformed JSON", async () => {
    mem.set(configPath, "{not json");

    await expect(readConfig({ configPath })).rejects.toThrow(`Config at ${configPath} is not valid JSON`);
  });
});
