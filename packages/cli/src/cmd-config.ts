/**
 * uis config - effective configuration summary command
 */
import { LIMIT_KEYS, resolveConfig } from "@uiscript/core";

export async function runConfig(opts: { json?: boolean; cwd?: string; homeDir?: string }): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  const { config } = resolved;

  if (opts.json) {
    console.log(JSON.stringify({ source: resolved.source, path: resolved.path, config }, null, 2));
    return 0;
  }

  console.log("Effective uiscript configuration");
  console.log(`  Source:    ${resolved.source}`);
  console.log(`  Path:      ${resolved.path ?? "(none)"}`);
  console.log(`  Enabled:   ${config.enabled}`);
  console.log(`  Sentinel:  ${config.sentinel}`);
  console.log(`  Limits:`);
  const width = Math.max(...LIMIT_KEYS.map((k) => k.length));
  for (const key of LIMIT_KEYS) {
    console.log(`    ${key.padEnd(width)}  ${config.limits[key]}`);
  }
  return 0;
}
