import { spawnSync } from "child_process";
import { Remote, type ConnectionSettings, type HostTarget, type RunResult } from "./base.js";
import { TransferError } from "../errors.js";

const SSH_TRANSPORT_FAILURE = 255;
const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

/** Single-quote a value for a POSIX shell. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

interface RawResult {
  stdout: Buffer;
  stderr: string;
  exitCode: number;
}

export class SshRemote extends Remote {
  private target: HostTarget;
  private settings: ConnectionSettings;

  constructor(target: HostTarget, settings: ConnectionSettings) {
    super();
    for (const value of [target.address, target.user]) {
      if (!value || /^-/.test(value) || /[\0\s@]/.test(value)) {
        throw new TransferError("usage", "InvalidArguments", `Invalid SSH host or user: ${value}`);
      }
    }
    if (!Number.isInteger(target.port) || target.port < 1 || target.port > 65535) {
      throw new TransferError("usage", "InvalidArguments", `Invalid SSH port: ${target.port}`);
    }
    this.target = target;
    this.settings = settings;
  }

  get destination(): string {
    return `${this.target.user}@${this.target.address}`;
  }

  private sshArgs(): string[] {
    return [
      "-p", String(this.target.port),
      "-o", `ConnectTimeout=${this.settings.connectTimeout}`,
      "-o", "BatchMode=yes",
      "--", this.destination,
    ];
  }

  private exec(command: string, input?: Buffer): RawResult {
    const result = spawnSync("ssh", [...this.sshArgs(), command], {
      input,
      timeout: this.settings.commandTimeout * 1000,
      maxBuffer: MAX_OUTPUT_BYTES,
    });

    if (result.error) {
      throw new TransferError(
        "unreachable",
        "HostUnreachable",
        `Lost contact with ${this.displayName}: ${result.error.message}`,
      );
    }
    if (result.status === null || result.status === SSH_TRANSPORT_FAILURE) {
      const detail = result.stderr ? result.stderr.toString("utf-8").trim() : "";
      throw new TransferError(
        "unreachable",
        "HostUnreachable",
        `Can't reach ${this.displayName}${detail ? `: ${detail}` : ""}`,
      );
    }

    return {
      stdout: result.stdout ?? Buffer.alloc(0),
      stderr: result.stderr ? result.stderr.toString("utf-8") : "",
      exitCode: result.status,
    };
  }

  run(command: string): RunResult {
    const result = this.exec(command);
    return {
      stdout: result.stdout.toString("utf-8"),
      stderr: result.stderr,
      exitCode: result.exitCode,
    };
  }

  isAvailable(): boolean {
    try {
      return this.run("true").exitCode === 0;
    } catch (e) {
      if (e instanceof TransferError) return false;
      throw e;
    }
  }

  listDirectory(dirPath: string): string[] | null {
    const result = this.run(`ls -1A -- ${shellQuote(dirPath)}`);
    if (result.exitCode !== 0) return null;
    return result.stdout.split("\n").filter(Boolean);
  }

  isDirectory(dirPath: string): boolean {
    return this.run(`test -d ${shellQuote(dirPath)}`).exitCode === 0;
  }

  findFiles(dirPath: string, extensions: string[]): string[] {
    if (extensions.length === 0) return [];
    const names = extensions.map((ext) => `-name ${shellQuote(`*${ext}`)}`).join(" -o ");
    // find exits 1 after any unreadable entry but still lists the rest.
    const result = this.run(`find ${shellQuote(dirPath)} -type f \\( ${names} \\) 2>/dev/null`);
    return result.stdout
      .split("\n")
      .filter((line) => line.startsWith(dirPath))
      .sort();
  }

  readFile(filePath: string): Buffer | null {
    const result = this.exec(`cat -- ${shellQuote(filePath)}`);
    if (result.exitCode === 0) {
      return result.stdout;
    }
    return null;
  }

  writeFile(filePath: string, data: Buffer): boolean {
    return this.exec(`cat > ${shellQuote(filePath)}`, data).exitCode === 0;
  }

  makeDirectory(dirPath: string): boolean {
    return this.run(`mkdir -p -- ${shellQuote(dirPath)}`).exitCode === 0;
  }

  copyTree(sourcePath: string, targetPath: string): boolean {
    const target = shellQuote(targetPath);
    return this.run(`test ! -e ${target} && cp -r -- ${shellQuote(sourcePath)} ${target}`).exitCode === 0;
  }

  get displayName(): string {
    const port = this.target.port === 22 ? "" : `:${this.target.port}`;
    return `ssh ${this.destination}${port}`;
  }
}
