import { resolve } from "node:path";

export function homeDir(): string {
  return process.env.HOME ?? process.cwd();
}

export function globalConfigDir(): string {
  return resolve(homeDir(), ".config", "jit-access");
}
