/**
 * Skein host builtins: file.read, file.write, file.exists, file.list
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import { HostError, makeArray, makeRecord, toJson } from "@skein/core";
import { defineBuiltin } from "@skein/std";
import { fileExistsArgs, fileListArgs, fileReadArgs, fileWriteArgs } from "./schemas.js";

async function io<T>(op: string, target: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new HostError(`cannot ${op} '${target}': ${msg}`, { category: "IO_ERROR", cause: e });
  }
}

/**
 * file.read(path, encoding?) -> string
 * `encoding` is "utf8" (default) or "base64".
 */
export const fileReadFn = defineBuiltin({
  name: "file.read",
  args: fileReadArgs,
  execute: ([filePath, encoding]) => {
    const resolved = path.resolve(filePath);
    return io("read", filePath, async () => {
      const buf = await fs.readFile(resolved);
      return buf.toString(encoding ?? "utf8");
    });
  },
});

/**
 * file.write(path, data) -> {path, bytes, sha256}
 * Strings are written as-is; any other value as its JSON form. Missing
 * parent directories are created.
 */
export const fileWriteFn = defineBuiltin({
  name: "file.write",
  args: fileWriteArgs,
  execute: async ([filePath, value]) => {
    const data = typeof value === "string" ? value : JSON.stringify(toJson(value));
    const resolved = path.resolve(filePath);
    await io("write", filePath, async () => {
      await fs.mkdir(path.dirname(resolved), { recursive: true });
      await fs.writeFile(resolved, data, "utf-8");
    });

    const sha256 = crypto.createHash("sha256").update(data).digest("hex");
    return makeRecord([
      ["path", resolved],
      ["bytes", BigInt(Buffer.byteLength(data, "utf-8"))],
      ["sha256", sha256],
    ]);
  },
});

export const fileExistsFn = defineBuiltin({
  name: "file.exists",
  args: fileExistsArgs,
  execute: async ([filePath]) => {
    try {
      await fs.access(path.resolve(filePath));
      return true;
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return false;
      throw new HostError(`cannot check '${filePath}': ${e instanceof Error ? e.message : String(e)}`, {
        category: "IO_ERROR",
        cause: e,
      });
    }
  },
});

/** file.list(dir) -> array of {name, type} records, sorted by name */
export const fileListFn = defineBuiltin({
  name: "file.list",
  args: fileListArgs,
  execute: async ([dirPath]) => {
    const entries = await io("list", dirPath, () => fs.readdir(path.resolve(dirPath), { withFileTypes: true }));
    const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return makeArray(
      sorted.map((entry) =>
        makeRecord([
          ["name", entry.name],
          ["type", entry.isDirectory() ? "directory" : entry.isFile() ? "file" : "other"],
        ])
      )
    );
  },
});

export const fileFns = [fileReadFn, fileWriteFn, fileExistsFn, fileListFn];
