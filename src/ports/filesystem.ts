export interface StatResult {
  size: number;
  mtimeMs: number;
  isDirectory(): boolean;
}

export interface GlobOptions {
  cwd: string;
  ignore?: string[];
  absolute?: boolean;
  dot?: boolean;
  onlyFiles?: boolean;
  followSymbolicLinks?: boolean;
}

export interface FileSystemPort {
  readFile(path: string): Promise<string>;
  readBytes(path: string): Promise<Uint8Array>;
  stat(path: string): Promise<StatResult>;
  access(path: string): Promise<void>;
  glob(patterns: string[], options: GlobOptions): Promise<string[]>;
}
