import type { Library, OsName, Rule, RuleContext } from "./types.ts";

type RuleOs = NonNullable<Rule["os"]>;

const PLATFORM_NAMES: Partial<Record<NodeJS.Platform, OsName>> = {
  linux: "linux",
  win32: "windows",
  darwin: "osx",
};

const ARCH_NAMES: Record<string, string> = {
  x64: "x86_64",
  arm64: "aarch64",
  ia32: "x86",
};

export function hostOsName(platform: NodeJS.Platform = process.platform): OsName {
  return PLATFORM_NAMES[platform] ?? "linux";
}

export function hostRuleContext(): RuleContext {
  return {
    osName: hostOsName(),
    osArch: ARCH_NAMES[process.arch] ?? process.arch,
    features: {},
  };
}

/**
 * `name` and `arch` must match when present. `version` is never compared.
 */
export function matchOsProperties(os: RuleOs, ctx: RuleContext): boolean {
  if (os.name !== undefined && os.name !== ctx.osName) return false;
  if (os.arch !== undefined && os.arch !== ctx.osArch) return false;
  return true;
}

/**
 * Library variant. An empty list does not match.
 */
export function matchLibraryRules(rules: Rule[], ctx: RuleContext): boolean {
  let result = false;
  for (const rule of rules) {
    if (rule.action === "allow") {
      result = true;
      if (rule.os) return matchOsProperties(rule.os, ctx);
    } else if (rule.os && matchOsProperties(rule.os, ctx)) {
      return false;
    }
  }
  return result;
}

/**
 * Argument variant. An empty list matches; feature-gated arguments never do.
 */
export function matchArgumentRules(rules: Rule[], ctx: RuleContext): boolean {
  for (const rule of rules) {
    if (rule.action !== "allow") continue;
    if (rule.features) return false;
    if (rule.os) return matchOsProperties(rule.os, ctx);
  }
  return true;
}

export function libraryMatches(library: Library, ctx: RuleContext): boolean {
  if (!library.rules) return true;
  return matchLibraryRules(library.rules, ctx);
}
