/**
 * Unit tests for TrashStore
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { TrashStore } from "./TrashStore";
import { AuditLogger } from "./AuditLogger";
import { ErrorCode, FileSystemError } from "../types";

describe("TrashStore", () => {
  let testDir: string;
  let trashDir: string;
  let lines: string[];
  let store: TrashStore;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "fops-trash-test-"));
    trashDir = path.join(testDir, "Trash");
    lines = [];
    store = new TrashStore(trashDir, new AuditLogger(true, (line) => lines.push(line)));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it("should move a file under files/ and record where it came from", async () => {
    const file = path.join(testDir, "notes.txt");
    fs.writeFileSync(file, "keep me");

    const receipt = await store.send(file);

    expect(receipt.originalPath).toBe(file);
    expect(receipt.storedPath).toBe(path.join(trashDir, "files", "notes.txt"));
    expect(fs.existsSync(file)).toBe(false);
    expect(fs.readFileSync(receipt.storedPath, "utf-8")).toBe("keep me");

    const info = fs.readFileSync(
      path.join(trashDir, "info", "notes.txt.trashinfo"),
      "utf-8"
    );
    const infoLines = info.split("\n");
    expect(infoLines[0]).toBe("[Trash Info]");
    expect(infoLines[1]).toBe(`Path=${encodeURI(file)}`);
    expect(infoLines[2]).toMatch(/^DeletionDate=\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/);
  });

  it("should keep both entries when names collide", async () => {
    const first = path.join(testDir, "a", "same.txt");
    const second = path.join(testDir, "b", "same.txt");
    fs.mkdirSync(path.dirname(first));
    fs.mkdirSync(path.dirname(second));
    fs.writeFileSync(first, "first");
    fs.writeFileSync(second, "second");

    const one = await store.send(first);
    const two = await store.send(second);

    expect(one.storedPath).toBe(path.join(trashDir, "files", "same.txt"));
    expect(path.basename(two.storedPath)).toMatch(/^same\.txt\.[0-9a-f]{8}$/);
    expect(fs.readFileSync(one.storedPath, "utf-8")).toBe("first");
    expect(fs.readFileSync(two.storedPath, "utf-8")).toBe("second");
    expect(fs.readdirSync(path.join(trashDir, "info"))).toHaveLength(2);
  });

  it("should not replace a stored entry whose info record is missing", async () => {
    fs.mkdirSync(path.join(trashDir, "files"), { recursive: true });
    fs.writeFileSync(path.join(trashDir, "files", "orphan.txt"), "earlier");
    const file = path.join(testDir, "orphan.txt");
    fs.writeFileSync(file, "later");

    const receipt = await store.send(file);

    expect(path.basename(receipt.storedPath)).toMatch(/^orphan\.txt\.[0-9a-f]{8}$/);
    expect(fs.readFileSync(path.join(trashDir, "files", "orphan.txt"), "utf-8")).toBe(
      "earlier"
    );
    expect(fs.readFileSync(receipt.storedPath, "utf-8")).toBe("later");
    expect(fs.readdirSync(path.join(trashDir, "info"))).toEqual([
      `${path.basename(receipt.storedPath)}.trashinfo`,
    ]);
  });

  it("should move whole directories", async () => {
    const dir = path.join(testDir, "project");
    fs.mkdirSync(path.join(dir, "src"), { recursive: true });
    fs.writeFileSync(path.join(dir, "src", "main.ts"), "export {};");

    const receipt = await store.send(dir);

    expect(fs.existsSync(dir)).toBe(false);
    expect(fs.readFileSync(path.join(receipt.storedPath, "src", "main.ts"), "utf-8")).toBe(
      "export {};"
    );
  });

  it("should audit each deletion", async () => {
    const file = path.join(testDir, "x.txt");
    fs.writeFileSync(file, "x");

    await store.send(file);

    expect(lines).toHaveLength(1);
    const record = JSON.parse(lines[0]);
    expect(record.level).toBe("AUDIT");
    expect(record.operation).toBe("trash");
    expect(record.paths).toEqual([file, path.join(trashDir, "files", "x.txt")]);
  });

  it("should fail with TRASH_UNAVAILABLE when the trash cannot be created", async () => {
    const blocker = path.join(testDir, "blocker");
    fs.writeFileSync(blocker, "");
    const blocked = new TrashStore(path.join(blocker, "Trash"));
    const file = path.join(testDir, "x.txt");
    fs.writeFileSync(file, "x");

    await expect(blocked.send(file)).rejects.toMatchObject({
      name: "FileSystemError",
      code: ErrorCode.TRASH_UNAVAILABLE,
    });
    expect(fs.existsSync(file)).toBe(true);
  });

  it("should report a trash on another device and release the reserved name", async () => {
    const file = path.join(testDir, "x.txt");
    fs.writeFileSync(file, "x");
    const crossDevice = Object.assign(new Error("EXDEV: cross-device link not permitted"), {
      code: "EXDEV",
    });
    jest.spyOn(fs.promises, "rename").mockRejectedValueOnce(crossDevice);

    const failure = store.send(file);

    await expect(failure).rejects.toBeInstanceOf(FileSystemError);
    await expect(failure).rejects.toMatchObject({ code: ErrorCode.TRASH_UNAVAILABLE });
    expect(fs.existsSync(file)).toBe(true);
    expect(fs.readdirSync(path.join(trashDir, "info"))).toEqual([]);
  });
});
