export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Where and as whom a host is reached. Fixed for the duration of a run. */
export interface HostTarget {
  address: string;
  user: string;
  port: number;
}

export interface ConnectionSettings {
  /** Seconds to wait for the transport to connect. */
  connectTimeout: number;
  /** Seconds a single remote operation may take before it is abandoned. */
  commandTimeout: number;
}

export abstract class Remote {
  abstract isAvailable(): boolean;
  abstract listDirectory(dirPath: string): string[] | null;
  abstract isDirectory(dirPath: string): boolean;
  abstract findFiles(dirPath: string, extensions: string[]): string[];
  abstract readFile(filePath: string): Buffer | null;
  abstract writeFile(filePath: string, data: Buffer): boolean;
  abstract makeDirectory(dirPath: string): boolean;
  abstract copyTree(sourcePath: string, targetPath: string): boolean;
  abstract get displayName(): string;
}

export function hasExtension(fileName: string, extensions: string[]): boolean {
  return extensions.some((ext) => fileName.endsWith(ext));
}
