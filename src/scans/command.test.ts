import { beforeEach, describe, expect, it, vi } from "vitest";

import { CommandAbortedError } from "../core/errors.js";

import { formatCommandLine, runCommand } from "./command.js";

type FakeExecaResult = {
  stdout: string;
  stderr: string;
  exitCode?: number;
  failed: boolean;
  isCanceled: boolean;
  shortMessage?: string;
};

const execaMock = vi.hoisted(() =>
  vi.fn(
    async (
      _file: string,
      _args: readonly string[],
      _options: Record<string, unknown>,
    ): Promise<FakeExecaResult> => ({
      stdout: "",
      stderr: "",
      exitCode: 0,
      failed: false,
      isCanceled: false,
    }),
  ),
);

vi.mock("execa", () => ({ execa: execaMock }));

beforeEach(() => {
  execaMock.mockClear();
});

describe("runCommand", () => {
  it("passes the signal through and returns output", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: "Nmap done",
      stderr: "",
      exitCode: 0,
      failed: false,
      isCanceled: false,
    });
    const controller = new AbortController();

    const result = await runCommand("nmap", ["-sS", "10.0.0.5"], {
      signal: controller.signal,
      cwd: "/tmp",
    });

    expect(result).toEqual({ stdout: "Nmap done", stderr: "", exitCode: 0 });
    expect(execaMock).toHaveBeenCalledTimes(1);
    const [file, args, options] = execaMock.mock.calls[0] ?? [];
    expect(file).toBe("nmap");
    expect(args).toEqual(["-sS", "10.0.0.5"]);
    expect(options).toMatchObject({ cwd: "/tmp", signal: controller.signal, reject: false });
  });

  it("resolves on a non-zero exit", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: "",
      stderr: "You requested a scan type which requires root privileges.",
      exitCode: 1,
      failed: true,
      isCanceled: false,
    });

    const result = await runCommand("nmap", ["-sS", "10.0.0.5"]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("You requested a scan type which requires root privileges.");
  });

  it("rejects with CommandAbortedError when the run was cancelled", async () => {
    const controller = new AbortController();
    execaMock.mockImplementationOnce(async () => {
      controller.abort(new Error("deadline"));
      return { stdout: "", stderr: "", failed: true, isCanceled: true };
    });

    await expect(
      runCommand("nmap", ["-p-", "10.0.0.5"], { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CommandAbortedError);
  });

  it("does not spawn when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(runCommand("nmap", [], { signal: controller.signal })).rejects.toThrow(
      "Command aborted: nmap",
    );
    expect(execaMock).not.toHaveBeenCalled();
  });

  it("throws when the process never started", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: "",
      stderr: "",
      failed: true,
      isCanceled: false,
      shortMessage: "Command failed with ENOENT: nmap-missing",
    });

    await expect(runCommand("nmap-missing", ["-V"])).rejects.toThrow(
      "Failed to run nmap-missing -V: Command failed with ENOENT: nmap-missing",
    );
  });
});

describe("formatCommandLine", () => {
  it("joins the binary and its arguments", () => {
    expect(formatCommandLine("sudo", ["nmap", "-sS", "10.0.0.5"])).toBe("sudo nmap -sS 10.0.0.5");
  });
});
