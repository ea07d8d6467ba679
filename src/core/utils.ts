import { spawn } from "node:child_process";

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

/** Time source for the limiter and forwarder; tests swap in a manual clock. */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms))
};

export function runCommand(
  cmd: string,
  args: string[],
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    timeoutMs?: number;
  } = {}
): Promise<CommandResult> {
  return new Promise((resolve) => {
    const proc = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: "pipe"
    });
    let stdout = "";
    let stderr = "";
    proc.stdout.on("data", (chunk) => {
      stdout += String(chunk);
    });
    proc.stderr.on("data", (chunk) => {
      stderr += String(chunk);
    });

    let timedOut = false;
    let timeoutHandle: NodeJS.Timeout | null = null;
    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGTERM");
      }, options.timeoutMs);
    }

    proc.on("close", (code) => {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      resolve({
        code: timedOut ? -1 : code ?? 0,
        stdout,
        stderr: timedOut ? `${stderr}\nTimed out` : stderr
      });
    });

    proc.on("error", (err) => {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      resolve({ code: -1, stdout, stderr: `${stderr}\n${err.message}` });
    });
  });
}

export function runInteractiveCommand(cmd: string, args: string[]): Promise<number> {
  return new Promise((resolve) => {
    const proc = spawn(cmd, args, { stdio: "inherit" });
    proc.on("exit", (code) => resolve(code ?? 0));
    proc.on("error", () => resolve(-1));
  });
}

export async function commandExists(command: string): Promise<boolean> {
  const result = await runCommand("bash", ["-lc", `command -v ${command}`], { timeoutMs: 3000 });
  return result.code === 0;
}

export function chunkText(text: string, size: number): string[] {
  if (text.length <= size) {
    return [text];
  }
  const chunks: string[] = [];
  let index = 0;
  while (index < text.length) {
    const end = Math.min(index + size, text.length);
    chunks.push(text.slice(index, end));
    index = end;
  }
  return chunks;
}

export function parseUserId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw.trim())) {
    return null;
  }
  const value = Number(raw.trim());
  return Number.isSafeInteger(value) ? value : null;
}
