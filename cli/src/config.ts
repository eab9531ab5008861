/**
 * Data directory and config.json handling
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { LOGS_DIR, SCREENSHOTS_DIR } from "./attachments/paths.js";

export const CONFIG_FILE = "config.json";
export const DATABASE_FILE = "crashdesk.db";
export const DATA_DIR_ENV = "CRASHDESK_DATA_DIR";
export const LOCAL_DATA_DIR = "crashdesk";
export const GLOBAL_DATA_DIR = ".crashdesk";

const appConfigSchema = z.object({
  bundle_id: z.string().min(1),
  name: z.string().min(1).optional(),
});

export const configSchema = z.object({
  api: z.object({
    issuer_id: z.string().min(1),
    key_id: z.string().min(1),
    /** Inline PEM, or a path to the .p8 file */
    private_key: z.string().min(1),
    base_url: z.string().url().optional(),
  }),
  apps: z.array(appConfigSchema).min(1, "at least one app must be configured"),
});

export type CrashdeskConfig = z.infer<typeof configSchema>;

export interface DataPaths {
  root: string;
  config: string;
  database: string;
  logs: string;
  screenshots: string;
}

export function dataPaths(dataDir: string): DataPaths {
  return {
    root: dataDir,
    config: path.join(dataDir, CONFIG_FILE),
    database: path.join(dataDir, DATABASE_FILE),
    logs: path.join(dataDir, LOGS_DIR),
    screenshots: path.join(dataDir, SCREENSHOTS_DIR),
  };
}

export interface ResolveDataDirOptions {
  dataDir?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
}

/**
 * Pick the data directory: explicit flag, then the environment, then a
 * ./crashdesk directory holding a config, then ~/.crashdesk
 */
export function resolveDataDir(options: ResolveDataDirOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();

  if (options.dataDir) {
    return path.resolve(cwd, expandHome(options.dataDir, homeDir));
  }
  const fromEnv = env[DATA_DIR_ENV];
  if (fromEnv) {
    return path.resolve(cwd, expandHome(fromEnv, homeDir));
  }
  const local = path.join(cwd, LOCAL_DATA_DIR);
  if (fs.existsSync(path.join(local, CONFIG_FILE))) {
    return local;
  }
  return path.join(homeDir, GLOBAL_DATA_DIR);
}

export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === "~") {
    return homeDir;
  }
  if (p.startsWith("~/")) {
    return path.join(homeDir, p.slice(2));
  }
  return p;
}

export function configTemplate(): CrashdeskConfig {
  return {
    api: {
      issuer_id: "00000000-0000-0000-0000-000000000000",
      key_id: "ABC123DEFG",
      private_key: "AuthKey_ABC123DEFG.p8",
    },
    apps: [{ bundle_id: "com.example.app", name: "Example" }],
  };
}

export interface InitDataDirResult {
  paths: DataPaths;
  configCreated: boolean;
}

/**
 * Create the directory layout and a template config.json. An existing
 * config is left untouched.
 */
export function initDataDir(dataDir: string): InitDataDirResult {
  const paths = dataPaths(dataDir);
  try {
    fs.mkdirSync(paths.logs, { recursive: true });
    fs.mkdirSync(paths.screenshots, { recursive: true });
    if (fs.existsSync(paths.config)) {
      return { paths, configCreated: false };
    }
    fs.writeFileSync(paths.config, JSON.stringify(configTemplate(), null, 2) + "\n", {
      mode: 0o600,
    });
  } catch (error) {
    throw new ConfigError(
      `Failed to initialize ${dataDir}: ${errorMessage(error)}`,
      dataDir
    );
  }
  return { paths, configCreated: true };
}

export function loadConfig(dataDir: string): CrashdeskConfig {
  const configPath = path.join(dataDir, CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(
      `No ${CONFIG_FILE} in ${dataDir}. Run 'crashdesk init' first.`,
      configPath
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${configPath}: ${errorMessage(error)}`,
      configPath
    );
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${configPath}: ${issues}`, configPath);
  }
  return result.data;
}

/**
 * The PEM text of the API key. A value that is not inline PEM is a path,
 * relative to the data directory.
 */
export function resolvePrivateKey(
  config: CrashdeskConfig,
  dataDir: string,
  homeDir: string = os.homedir()
): string {
  const value = config.api.private_key.trim();
  if (value.startsWith("-----BEGIN")) {
    return value;
  }

  const keyPath = path.resolve(dataDir, expandHome(value, homeDir));
  try {
    return fs.readFileSync(keyPath, "utf8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read private key ${keyPath}: ${errorMessage(error)}`,
      keyPath
    );
  }
}
