import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  createStoreConfigSchema,
  type StoreConfig,
} from "../schemas/store-config.js";
import { defaultStorePath } from "./defaults.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

function resolvePaths(options?: LoadConfigOptions): {
  configPath: string;
  rootPath: string;
} {
  if (options?.configPath !== undefined) {
    return {
      configPath: options.configPath,
      rootPath:
        options.rootPath !== undefined
          ? resolveRootPath(options.rootPath)
          : dirname(options.configPath),
    };
  }
  const rootPath = resolveRootPath(options?.rootPath);
  return { configPath: join(rootPath, "config.json"), rootPath };
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<StoreConfig> {
  const { configPath, rootPath } = resolvePaths(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      // Missing file: every field takes its default
    } else {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = createStoreConfigSchema(defaultStorePath(rootPath)).parse(
    parsed,
  );

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return config;
}

export async function saveConfig(
  config: StoreConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const { configPath } = resolvePaths(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}
