import { spawn } from "node:child_process";
import { readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";
import {
  CONVERT_TIMEOUT_MS,
  ConversionFailedError,
  ConverterUnavailableError,
  UnprocessableDocumentError,
} from "@slidetext/utils";
import { withTempDir } from "./temp.js";

export interface ProcessResult {
  exitCode: number | null;
  stderr: string;
  timedOut: boolean;
}

/** Runs a command to completion. Rejects only when it cannot be started. */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: { timeoutMs: number },
) => Promise<ProcessResult>;

/**
 * Spawns the command as the leader of its own process group. soffice is a
 * wrapper that forks oosplash and soffice.bin, which inherit stderr, so the
 * whole group is killed on timeout and again once the leader exits.
 */
export const runProcess: ProcessRunner = (command, args, { timeoutMs }) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "ignore", "pipe"], detached: true });
    let stderr = "";
    let timedOut = false;

    const killGroup = () => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, "SIGKILL");
      } catch (err) {
        // ESRCH: the group is already gone.
        if (!isErrnoException(err) || err.code !== "ESRCH") {
          console.error("[converter] could not kill process group", child.pid, err);
        }
      }
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup();
    }, timeoutMs);

    child.stderr.setEncoding("utf-8");
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.once("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    child.once("exit", () => {
      clearTimeout(timer);
      killGroup();
    });
    child.once("close", (exitCode) => resolve({ exitCode, stderr, timedOut }));
  });

export interface OfficeConverterOptions {
  /** LibreOffice executable, looked up on PATH unless absolute. */
  binary?: string;
  timeoutMs?: number;
  /** Parent directory for the per-conversion working directory. */
  tmpDir?: string;
  runner?: ProcessRunner;
}

/**
 * Converts office documents between formats by running LibreOffice headless
 * in a private working directory.
 */
export class OfficeConverter {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly tmpDir: string;
  private readonly runner: ProcessRunner;

  constructor(options: OfficeConverterOptions = {}) {
    this.binary = options.binary ?? "soffice";
    this.timeoutMs = options.timeoutMs ?? CONVERT_TIMEOUT_MS;
    this.tmpDir = options.tmpDir ?? os.tmpdir();
    this.runner = options.runner ?? runProcess;
  }

  async convert(buffer: Buffer, sourceExt: string, targetExt: string): Promise<Buffer> {
    return withTempDir(async (dir) => {
      const input = path.join(dir, `input.${sourceExt}`);
      await writeFile(input, buffer);

      // A profile per run: LibreOffice refuses a second instance on a shared profile.
      const profile = pathToFileURL(path.join(dir, "profile")).href;
      const args = [
        "--headless",
        "--norestore",
        `-env:UserInstallation=${profile}`,
        "--convert-to",
        targetExt,
        "--outdir",
        dir,
        input,
      ];

      let result: ProcessResult;
      try {
        result = await this.runner(this.binary, args, { timeoutMs: this.timeoutMs });
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") {
          throw new ConverterUnavailableError();
        }
        throw new ConversionFailedError(undefined, err instanceof Error ? err.message : String(err));
      }

      if (result.timedOut) {
        console.error("[converter] soffice timed out after", `${this.timeoutMs}ms`);
        throw new ConversionFailedError("Document conversion timed out", result.stderr);
      }
      if (result.exitCode !== 0) {
        console.error("[converter] soffice exited with", result.exitCode, result.stderr.trim());
        throw new ConversionFailedError(undefined, result.stderr);
      }

      try {
        return await readFile(path.join(dir, `input.${targetExt}`));
      } catch {
        throw new UnprocessableDocumentError(
          `Could not convert .${sourceExt} document to .${targetExt}`,
        );
      }
    }, this.tmpDir);
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
