import * as fs from "fs";
import * as path from "path";
import { Remote, hasExtension } from "./base.js";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

/** The machine savehop itself runs on, reached through the filesystem. */
export class LocalRemote extends Remote {
  isAvailable(): boolean {
    return true;
  }

  listDirectory(dirPath: string): string[] | null {
    try {
      return fs.readdirSync(dirPath);
    } catch (e) {
      if (isErrnoException(e)) return null;
      throw e;
    }
  }

  isDirectory(dirPath: string): boolean {
    try {
      return fs.statSync(dirPath).isDirectory();
    } catch (e) {
      if (isErrnoException(e)) return false;
      throw e;
    }
  }

  findFiles(dirPath: string, extensions: string[]): string[] {
    if (!this.isDirectory(dirPath)) return [];
    const files: string[] = [];
    walkDir(dirPath, extensions, files);
    return files.sort();
  }

  readFile(filePath: string): Buffer | null {
    try {
      return fs.readFileSync(filePath);
    } catch (e) {
      if (isErrnoException(e)) return null;
      throw e;
    }
  }

  writeFile(filePath: string, data: Buffer): boolean {
    try {
      fs.writeFileSync(filePath, data);
      return true;
    } catch (e) {
      if (isErrnoException(e)) return false;
      throw e;
    }
  }

  makeDirectory(dirPath: string): boolean {
    try {
      fs.mkdirSync(dirPath, { recursive: true });
      return true;
    } catch (e) {
      if (isErrnoException(e)) return false;
      throw e;
    }
  }

  copyTree(sourcePath: string, targetPath: string): boolean {
    try {
      fs.cpSync(sourcePath, targetPath, { recursive: true, errorOnExist: true, force: false });
      return true;
    } catch (e) {
      if (isErrnoException(e)) return false;
      throw e;
    }
  }

  get displayName(): string {
    return "local";
  }
}

function walkDir(dir: string, extensions: string[], files: string[]): void {
  let entries: string[];
  try {
    entries = fs.readdirSync(dir).sort();
  } catch (e) {
    if (isErrnoException(e)) return;
    throw e;
  }
  for (const entry of entries) {
    const full = path.posix.join(dir, entry);
    let stat: fs.Stats;
    try {
      stat = fs.statSync(full);
    } catch (e) {
      // Dangling links and entries removed mid-walk.
      if (isErrnoException(e)) continue;
      throw e;
    }
    if (stat.isFile() && hasExtension(entry, extensions)) {
      files.push(full);
    } else if (stat.isDirectory()) {
      walkDir(full, extensions, files);
    }
  }
}
