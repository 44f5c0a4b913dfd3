/**
 * skein config - effective configuration summary command
 */
import { resolveConfig, buildAllowedNamespaces } from "@skein/core";

function sortStrings(values: string[]): string[] {
  return [...values].sort((a, b) => a.localeCompare(b));
}

export async function runConfig(opts: { json?: boolean; cwd?: string; homeDir?: string }): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  const allow = sortStrings(resolved.config.allow);
  const deny = sortStrings(resolved.config.deny ?? []);
  const effectiveAllow = sortStrings([...buildAllowedNamespaces(resolved.config, false)]);
  const limits = resolved.config.limits ?? {};

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: { version: resolved.config.version, allow, deny, limits },
          effectiveAllow,
        },
        null,
        2
      )
    );
    return 0;
  }

  const formatList = (items: string[]): string => (items.length > 0 ? items.join(", ") : "(none)");
  const hasLimits = Object.keys(limits).length > 0;

  console.log("Effective Skein configuration");
  console.log(`  Source:          ${resolved.source}`);
  console.log(`  Path:            ${resolved.path ?? "(none)"}`);
  console.log(`  Allow:           ${formatList(allow)}`);
  console.log(`  Deny:            ${formatList(deny)}`);
  console.log(`  Effective allow: ${formatList(effectiveAllow)}`);
  console.log(`  Limits:          ${hasLimits ? JSON.stringify(limits) : "(none)"}`);
  return 0;
}
