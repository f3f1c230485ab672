/**
 * Integration tests for fops
 * Tests complete workflows across multiple components
 */

import * as crypto from "crypto";
import * as fc from "fast-check";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { createEngine } from "./createEngine";
import { ConfigLoader, EngineConfig } from "./ConfigLoader";
import { ScriptedPrompt } from "./ScriptedPrompt";
import { ExitCode } from "../interfaces/IBatchOrchestrator";
import { DEFAULT_OPTIONS } from "../interfaces/IOperationRequest";
import { ErrorCode } from "../types";

function digest(content: Buffer | Uint8Array): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

describe("fops Integration Tests", () => {
  let tempDir: string;
  let config: EngineConfig;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "fops-integration-"));
    config = {
      ...ConfigLoader.defaults({}),
      trashDir: path.join(tempDir, ".trash"),
      chunkSize: 1024,
    };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("Moving into a missing directory", () => {
    let source: string;
    let outdir: string;

    beforeEach(() => {
      source = path.join(tempDir, "a.txt");
      outdir = path.join(tempDir, "outdir");
      fs.writeFileSync(source, "0123456789");
    });

    it("should abort and touch nothing without auto-mkdir", async () => {
      const engine = createEngine(config, { prompt: new ScriptedPrompt(["n"]) });

      const summary = await engine.run({
        verb: "move",
        sources: [source],
        destination: outdir,
        options: { ...DEFAULT_OPTIONS },
      });

      expect(summary.results[0].outcome).toEqual({
        status: "aborted",
        reason: ErrorCode.MISSING_TARGET_DIRECTORY,
      });
      expect(summary.exitCode).toBe(ExitCode.ABORTED);
      expect(fs.readdirSync(tempDir)).toEqual(["a.txt"]);
      expect(fs.readFileSync(source, "utf-8")).toBe("0123456789");
    });

    it("should create the directory and move the file with auto-mkdir", async () => {
      const engine = createEngine(config, { prompt: new ScriptedPrompt() });

      const summary = await engine.run({
        verb: "move",
        sources: [source],
        destination: outdir,
        options: { ...DEFAULT_OPTIONS, autoMkdir: true },
      });

      expect(summary.exitCode).toBe(ExitCode.SUCCESS);
      expect(fs.readFileSync(path.join(outdir, "a.txt"), "utf-8")).toBe("0123456789");
      expect(fs.existsSync(source)).toBe(false);
    });
  });

  it("should copy a five-file tree and skip the one conflict", async () => {
    const tree = path.join(tempDir, "src", "tree");
    const dest = path.join(tempDir, "dest");
    fs.mkdirSync(tree, { recursive: true });
    for (let index = 1; index <= 5; index++) {
      fs.writeFileSync(path.join(tree, `file${index}.txt`), `content ${index}`);
    }
    fs.mkdirSync(path.join(dest, "tree"), { recursive: true });
    fs.writeFileSync(path.join(dest, "tree", "file3.txt"), "already here");
    const prompt = new ScriptedPrompt(["s"]);
    const engine = createEngine(config, { prompt });

    const summary = await engine.run({
      verb: "copy",
      sources: [tree],
      destination: dest,
      options: { ...DEFAULT_OPTIONS },
    });

    expect(summary.counts).toEqual({ succeeded: 4, skipped: 1, failed: 0, aborted: 0 });
    expect(summary.exitCode).toBe(ExitCode.SUCCESS);
    expect(prompt.asked).toEqual([
      { kind: "overwrite", path: path.join(dest, "tree", "file3.txt") },
    ]);
    for (const index of [1, 2, 4, 5]) {
      expect(fs.readFileSync(path.join(dest, "tree", `file${index}.txt`), "utf-8")).toBe(
        `content ${index}`
      );
    }
    expect(fs.readFileSync(path.join(dest, "tree", "file3.txt"), "utf-8")).toBe(
      "already here"
    );
  });

  it("should refuse to copy a tree into a symlink that points inside it", async () => {
    const tree = path.join(tempDir, "tree");
    const link = path.join(tempDir, "link");
    fs.mkdirSync(path.join(tree, "sub"), { recursive: true });
    fs.writeFileSync(path.join(tree, "top.txt"), "top");
    fs.symlinkSync(path.join(tree, "sub"), link);
    const engine = createEngine(config, { prompt: new ScriptedPrompt() });

    const summary = await engine.run({
      verb: "copy",
      sources: [tree],
      destination: link,
      options: { ...DEFAULT_OPTIONS },
    });

    expect(summary.results[0].outcome.status).toBe("failed");
    expect(
      summary.results[0].outcome.status === "failed" && summary.results[0].outcome.error.code
    ).toBe(ErrorCode.RECURSIVE_CONFLICT);
    expect(summary.exitCode).toBe(ExitCode.FAILURE);
    expect(fs.readdirSync(path.join(tree, "sub"))).toEqual([]);
  });

  it("should back up report.txt to report.txt.bak3", async () => {
    const report = path.join(tempDir, "report.txt");
    fs.writeFileSync(report, "latest");
    fs.writeFileSync(`${report}.bak`, "first");
    fs.writeFileSync(`${report}.bak2`, "second");
    const engine = createEngine(config, { prompt: new ScriptedPrompt() });

    await engine.run({ verb: "backup", sources: [report], options: { ...DEFAULT_OPTIONS } });

    expect(fs.readFileSync(`${report}.bak3`, "utf-8")).toBe("latest");
    expect(fs.readFileSync(report, "utf-8")).toBe("latest");
  });

  /**
   * A successful move leaves no source and a byte-identical target; a
   * successful copy leaves both, identical.
   */
  describe("Property: transfers preserve content", () => {
    it("should move and copy any content byte for byte", async () => {
      let iteration = 0;
      await fc.assert(
        fc.asyncProperty(
          fc.uint8Array({ minLength: 0, maxLength: 8192 }),
          fc.constantFrom("move" as const, "copy" as const),
          async (content, verb) => {
            const workDir = path.join(tempDir, `run-${iteration++}`);
            const source = path.join(workDir, "payload.bin");
            const dest = path.join(workDir, "out");
            fs.mkdirSync(workDir);
            fs.writeFileSync(source, content);
            const engine = createEngine(config, { prompt: new ScriptedPrompt() });

            const summary = await engine.run({
              verb,
              sources: [source],
              destination: dest,
              options: { ...DEFAULT_OPTIONS, autoMkdir: true },
            });

            expect(summary.exitCode).toBe(ExitCode.SUCCESS);
            expect(digest(fs.readFileSync(path.join(dest, "payload.bin")))).toBe(
              digest(content)
            );
            expect(fs.existsSync(source)).toBe(verb === "copy");
          }
        ),
        { numRuns: 30 }
      );
    });
  });

  /**
   * Backups never overwrite an earlier backup: every run adds one new name.
   */
  describe("Property: backups never overwrite", () => {
    it("should produce a new name on every run", async () => {
      let iteration = 0;
      await fc.assert(
        fc.asyncProperty(fc.integer({ min: 1, max: 6 }), async (runs) => {
          const workDir = path.join(tempDir, `backup-${iteration++}`);
          fs.mkdirSync(workDir);
          const source = path.join(workDir, "data.db");
          fs.writeFileSync(source, "rows");
          const engine = createEngine(config, { prompt: new ScriptedPrompt() });

          const names = new Set<string>();
          for (let run = 0; run < runs; run++) {
            const summary = await engine.run({
              verb: "backup",
              sources: [source],
              options: { ...DEFAULT_OPTIONS },
            });
            const target = summary.results[0].targetPath;
            expect(target).toBeDefined();
            expect(names.has(target ?? "")).toBe(false);
            names.add(target ?? "");
          }

          expect(fs.readdirSync(workDir)).toHaveLength(runs + 1);
        }),
        { numRuns: 10 }
      );
    });
  });
});
