import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Logger } from "pino";
import type { CaptureAdapter, CaptureRequest } from "./adapter";

const execFileAsync = promisify(execFile);

export type ScriptRunner = (
  script: string,
  options: { timeoutMs: number; signal: AbortSignal },
) => Promise<string>;

// Brings the desktop app forward, sends the copy-last-response shortcut
// (cmd+shift+c) and reads the clipboard back.
export const COPY_LAST_RESPONSE_SCRIPT = `
tell application "Claude"
  activate
  delay 0.5
  key code 8 using {command down, shift down}
  delay 0.2
end tell
delay 0.5
return the clipboard as string
`;

export const READ_CLIPBOARD_SCRIPT = "return the clipboard as string";

export const runOsascript: ScriptRunner = async (script, options) => {
  const { stdout } = await execFileAsync("osascript", ["-e", script], {
    timeout: options.timeoutMs,
    signal: options.signal,
    encoding: "utf8",
    maxBuffer: 4 * 1024 * 1024,
  });
  return stdout;
};

/**
 * Captures the last assistant response through macOS automation. When the
 * shortcut yields nothing, the clipboard is read once more on its own.
 */
export class AppleScriptCaptureAdapter implements CaptureAdapter {
  readonly name = "applescript";

  constructor(
    private readonly logger: Logger,
    private readonly runScript: ScriptRunner = runOsascript,
  ) {}

  async captureLastResponse(request: CaptureRequest): Promise<string> {
    const copied = (await this.runScript(COPY_LAST_RESPONSE_SCRIPT, request)).trim();
    if (copied.length > 0) {
      return copied;
    }

    this.logger.debug("Copy shortcut produced no text, reading clipboard directly");
    return (await this.runScript(READ_CLIPBOARD_SCRIPT, request)).trim();
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.runScript('return "ok"', {
        timeoutMs: 5000,
        signal: AbortSignal.timeout(5000),
      });
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "AppleScript is not available, capture will fail");
      return false;
    }
  }
}
