/**
 * `FileSystem` backed by node:fs/promises.
 *
 * ENOENT on read becomes `FileNotFound`; every other failure is an
 * `IOFailure` carrying the original error as `cause`.
 */
import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { Effect } from "effect";
import { FileNotFound, IOFailure, type FileSystem } from "@charvocab/core";

function errorCode(cause: unknown): string | undefined {
  if (typeof cause === "object" && cause !== null && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

const ioFailure = (action: string, path: string) => (cause: unknown) =>
  new IOFailure({ message: `Failed to ${action} "${path}"`, path, cause });

export const nodeFileSystem: FileSystem = {
  isFile: (path) =>
    Effect.tryPromise({
      try: () =>
        stat(path).then(
          (s) => s.isFile(),
          (err: unknown) => {
            if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return false;
            throw err;
          },
        ),
      catch: ioFailure("stat", path),
    }),

  readText: (path) =>
    Effect.tryPromise({
      try: () => readFile(path, "utf-8"),
      catch: (cause) =>
        errorCode(cause) === "ENOENT"
          ? new FileNotFound({ message: `No such file: "${path}"`, path })
          : ioFailure("read", path)(cause),
    }),

  writeText: (path, data) =>
    Effect.tryPromise({
      try: () => writeFile(path, data, "utf-8"),
      catch: ioFailure("write", path),
    }),

  rename: (from, to) =>
    Effect.tryPromise({
      try: () => rename(from, to),
      catch: ioFailure(`rename to "${to}"`, from),
    }),

  remove: (path) =>
    Effect.tryPromise({
      try: () => rm(path, { force: true }),
      catch: ioFailure("remove", path),
    }),

  makeDirectory: (path) =>
    Effect.tryPromise({
      try: () => mkdir(path, { recursive: true }).then(() => undefined),
      catch: ioFailure("create directory", path),
    }),
};
