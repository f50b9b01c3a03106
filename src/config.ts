import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";

const configSchema = z.object({
  store: z
    .object({
      path: z.string().default(".photobridge.db"),
    })
    .default({}),
  flickr: z
    .object({
      apiKey: z.string().default(""),
      apiSecret: z.string().default(""),
      oauthToken: z.string().default(""),
      oauthTokenSecret: z.string().default(""),
    })
    .default({}),
  google: z
    .object({
      appName: z.string().default("photobridge"),
      clientId: z.string().default(""),
      clientSecret: z.string().default(""),
      accessToken: z.string().default(""),
      refreshToken: z.string().default(""),
      tokenServerUrl: z.string().url().default("https://oauth2.googleapis.com/token"),
    })
    .default({}),
  import: z
    .object({
      defaultService: z.enum(["flickr", "google"]).default("flickr"),
    })
    .default({}),
  display: z
    .object({
      progressBarWidth: z.number().min(10).max(100).default(20),
      columns: z
        .object({
          albumName: z.number().min(5).max(80).default(24),
          vendorId: z.number().min(5).max(80).default(24),
        })
        .default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ServiceName = Config["import"]["defaultService"];

const CONFIG_FILENAME = "config.yaml";
const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "photobridge");

// Secrets may come from the environment instead of the config file
const ENV_OVERRIDES: Array<[string, (config: Config, value: string) => void]> = [
  ["FLICKR_API_KEY", (c, v) => { c.flickr.apiKey = v; }],
  ["FLICKR_API_SECRET", (c, v) => { c.flickr.apiSecret = v; }],
  ["FLICKR_OAUTH_TOKEN", (c, v) => { c.flickr.oauthToken = v; }],
  ["FLICKR_OAUTH_TOKEN_SECRET", (c, v) => { c.flickr.oauthTokenSecret = v; }],
  ["GOOGLE_CLIENT_ID", (c, v) => { c.google.clientId = v; }],
  ["GOOGLE_CLIENT_SECRET", (c, v) => { c.google.clientSecret = v; }],
  ["GOOGLE_ACCESS_TOKEN", (c, v) => { c.google.accessToken = v; }],
  ["GOOGLE_REFRESH_TOKEN", (c, v) => { c.google.refreshToken = v; }],
];

export function expandPath(p: string): string {
  if (p === ":memory:") {
    return p;
  }
  if (p.startsWith("~/")) {
    return join(homedir(), p.slice(2));
  }
  return resolve(p);
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

export function getConfigPath(): string {
  const localPath = join(process.cwd(), CONFIG_FILENAME);
  if (existsSync(localPath)) {
    return localPath;
  }
  return join(GLOBAL_CONFIG_DIR, CONFIG_FILENAME);
}

export function loadConfig(
  configPath: string = getConfigPath(),
  env: NodeJS.ProcessEnv = process.env
): Config {
  let raw: unknown = {};
  if (existsSync(configPath)) {
    const content = readFileSync(configPath, "utf-8");
    // An empty file parses to null
    raw = parseYaml(content) ?? {};
  }

  const config = configSchema.parse(raw);

  for (const [name, apply] of ENV_OVERRIDES) {
    const value = env[name];
    if (value) {
      apply(config, value);
    }
  }

  config.store.path = expandPath(config.store.path);

  return config;
}

export function getDefaultConfig(): string {
  return `# photobridge Configuration

store:
  path: .photobridge.db       # Job store (album mappings, staged photos)

flickr:
  apiKey: ""                  # or FLICKR_API_KEY
  apiSecret: ""               # or FLICKR_API_SECRET
  oauthToken: ""              # or FLICKR_OAUTH_TOKEN
  oauthTokenSecret: ""        # or FLICKR_OAUTH_TOKEN_SECRET

google:
  appName: photobridge        # Client name attached to uploaded photos
  clientId: ""                # or GOOGLE_CLIENT_ID
  clientSecret: ""            # or GOOGLE_CLIENT_SECRET
  accessToken: ""             # or GOOGLE_ACCESS_TOKEN
  refreshToken: ""            # or GOOGLE_REFRESH_TOKEN
  tokenServerUrl: https://oauth2.googleapis.com/token

import:
  defaultService: flickr      # "flickr" or "google"

display:
  progressBarWidth: 20        # Width of progress bar in characters
  columns:
    albumName: 24             # Album name column width
    vendorId: 24              # Vendor album id column width
`;
}
