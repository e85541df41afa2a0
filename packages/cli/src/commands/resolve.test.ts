import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createAssemblyResolver } from "@asmprobe/resolver";
import { resolveConfig } from "../config.js";
import { classifyCommand } from "./classify.js";
import {
  formatPaths,
  probeCommand,
  resolveCommand,
} from "./resolve.js";

describe("resolve commands", () => {
  const createdDirs: string[] = [];

  afterEach(() => {
    for (const dir of createdDirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  const createDir = (): string => {
    const dir = mkdtempSync(join(tmpdir(), "asmprobe-commands-"));
    createdDirs.push(dir);
    return dir;
  };

  it("should return the resolved paths", () => {
    const lib = createDir();
    writeFileSync(join(lib, "Widget.dll"), "not-a-real-assembly");
    const config = resolveConfig({ searchDirs: [lib] }, {}, lib, lib);
    const resolver = createAssemblyResolver({ sharedDirectory: createDir() });

    expect(resolveCommand(resolver, "Widget", config)).to.deep.equal({
      ok: true,
      value: { paths: [join(lib, "Widget.dll")] },
    });
  });

  it("should describe the search when nothing resolves", () => {
    const first = createDir();
    const second = createDir();
    const config = resolveConfig({ searchDirs: [first, second] }, {}, first, first);
    const resolver = createAssemblyResolver({ sharedDirectory: createDir() });

    expect(resolveCommand(resolver, "Widget", config)).to.deep.equal({
      ok: false,
      error:
        "No assembly found for 'Widget' (2 search directories and shared location)",
    });
  });

  it("should name the probed directory on a miss", () => {
    const dir = createDir();
    const resolver = createAssemblyResolver();

    expect(probeCommand(resolver, "Widget", dir)).to.deep.equal({
      ok: false,
      error: `No assembly found for 'Widget' in ${dir}`,
    });
  });

  it("should format paths as lines or JSON", () => {
    const paths = ["/opt/lib/Widget.dll", "/opt/lib/Gadget.dll"];
    expect(formatPaths(paths, false)).to.equal(
      "/opt/lib/Widget.dll\n/opt/lib/Gadget.dll"
    );
    expect(formatPaths(paths, true)).to.equal(
      '["/opt/lib/Widget.dll","/opt/lib/Gadget.dll"]'
    );
  });

  it("should classify references", () => {
    expect(classifyCommand("System.Linq")).to.equal("symbolic");
    expect(classifyCommand("lib|v2")).to.equal("path");
  });
});
