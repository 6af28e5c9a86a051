import { delimiter, resolve } from "node:path";
import { dedupLibraries } from "./dedup.ts";
import { loaderLibraryPath } from "./maven.ts";
import { libraryMatches, matchArgumentRules } from "./rules.ts";
import type {
  Argument,
  GameManifest,
  LoaderManifest,
  RuleContext,
} from "./types.ts";

export type LaunchVariables = Record<string, string>;

export type LaunchPlan = {
  mainClass: string;
  classpath: string;
  args: string[];
};

export type ComposeLaunchInput = {
  gameManifest: GameManifest;
  loaderManifest?: LoaderManifest;
  /** Library-relative client jar, or an absolute path to a patched jar. */
  mainJar: string;
  librariesDir: string;
  ruleContext: RuleContext;
  variables: LaunchVariables;
};

const PLACEHOLDER = /\$\{([A-Za-z0-9_]+)\}/g;

/**
 * Replaces `${name}` placeholders. Unknown names are left as written.
 */
export function substituteVariables(
  template: string,
  variables: LaunchVariables,
): string {
  return template.replace(
    PLACEHOLDER,
    (match, name: string) => variables[name] ?? match,
  );
}

export function matchedArguments(args: readonly Argument[], ctx: RuleContext): string[] {
  return args.flatMap((arg) => {
    if (typeof arg === "string") return [arg];
    if (!matchArgumentRules(arg.rules, ctx)) return [];
    return typeof arg.value === "string" ? [arg.value] : arg.value;
  });
}

function splitLegacyArguments(args: string | undefined): string[] {
  return args ? args.split(" ").filter((arg) => arg.length > 0) : [];
}

export function classpathEntries(
  gameManifest: GameManifest,
  loaderManifest: LoaderManifest | undefined,
  mainJar: string,
  ctx: RuleContext,
): string[] {
  const libs = [mainJar];
  for (const library of gameManifest.libraries) {
    if (!libraryMatches(library, ctx)) continue;
    if (library.downloads.artifact) libs.push(library.downloads.artifact.path);
  }
  if (loaderManifest?.dist.kind === "current") {
    libs.push(...loaderManifest.dist.libraries.map(loaderLibraryPath));
  }
  return dedupLibraries(libs);
}

/**
 * Argument templates before substitution, in launch order: JVM options,
 * main class, then game arguments.
 */
export function argumentTemplates(
  gameManifest: GameManifest,
  loaderManifest: LoaderManifest | undefined,
  ctx: RuleContext,
): { mainClass: string; args: string[] } {
  if (loaderManifest) {
    const { dist } = loaderManifest;
    const args: string[] = [];
    let mainClass: string;
    if (dist.kind === "legacy") {
      mainClass = gameManifest.mainClass;
      args.push(
        "-Dminecraft.applet.TargetDirectory=${game_directory}",
        "-Djava.library.path=${natives_directory}",
        "-Dfml.ignoreInvalidMinecraftCertificates=true",
        "-Dfml.ignorePatchDiscrepancies=true",
        "-cp",
        "${classpath}",
        mainClass,
        ...splitLegacyArguments(gameManifest.minecraftArguments),
      );
    } else {
      mainClass = dist.mainClass;
      args.push(
        "-Djava.library.path=${natives_directory}",
        "-cp",
        "${classpath}",
        mainClass,
        ...splitLegacyArguments(dist.minecraftArguments ?? gameManifest.minecraftArguments),
      );
    }
    const tweaker = loaderManifest.tweakers?.[0];
    if (tweaker) args.push("--tweakClass", tweaker);
    return { mainClass, args };
  }

  const mainClass = gameManifest.mainClass;
  if (gameManifest.arguments) {
    return {
      mainClass,
      args: [
        ...matchedArguments(gameManifest.arguments.jvm, ctx),
        mainClass,
        ...matchedArguments(gameManifest.arguments.game, ctx),
      ],
    };
  }
  return {
    mainClass,
    args: [
      "-Djava.library.path=${natives_directory}",
      "-cp",
      "${classpath}",
      mainClass,
      ...splitLegacyArguments(gameManifest.minecraftArguments),
    ],
  };
}

export function composeLaunch(input: ComposeLaunchInput): LaunchPlan {
  const { gameManifest, loaderManifest, ruleContext } = input;
  const classpath = classpathEntries(gameManifest, loaderManifest, input.mainJar, ruleContext)
    .map((path) => resolve(input.librariesDir, path))
    .join(delimiter);

  const variables = { ...input.variables, classpath };
  const { mainClass, args } = argumentTemplates(gameManifest, loaderManifest, ruleContext);
  return {
    mainClass,
    classpath,
    args: args.map((arg) => substituteVariables(arg, variables)),
  };
}
