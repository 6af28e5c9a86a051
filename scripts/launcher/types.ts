export type OsName = "linux" | "windows" | "osx";

export type Rule = {
  action: "allow" | "disallow";
  os?: {
    name?: string;
    version?: string;
    arch?: string;
  };
  features?: Record<string, boolean>;
};

export type RuleContext = {
  osName: OsName;
  osArch: string;
  osVersion?: string;
  features?: Record<string, boolean>;
};

export type Artifact = {
  path: string;
  sha1: string;
  size: number;
  url: string;
};

export type Download = Omit<Artifact, "path">;

export type Library = {
  name: string;
  downloads: {
    artifact?: Artifact;
    classifiers?: Record<string, Artifact>;
  };
  natives?: Partial<Record<OsName, string>>;
  rules?: Rule[];
  extract?: { exclude: string[] };
};

export type AssetIndex = {
  id: string;
  sha1: string;
  size: number;
  totalSize: number;
  url: string;
};

export type AssetObject = {
  hash: string;
  size: number;
};

export type AssetManifest = {
  objects: Record<string, AssetObject>;
  virtual?: boolean;
  map_to_resources?: boolean;
};

export type Argument = string | {
  rules: Rule[];
  value: string | string[];
};

export type GameManifest = {
  id: string;
  type: string;
  arguments?: {
    game: Argument[];
    jvm: Argument[];
  };
  minecraftArguments?: string;
  mainClass: string;
  libraries: Library[];
  assetIndex: AssetIndex;
  assets: string;
  downloads: {
    client: Download;
    server?: Download;
  };
  javaVersion?: { component: string; majorVersion: number };
  releaseTime?: string;
};

export type VersionManifestEntry = {
  id: string;
  type: string;
  url: string;
  time: string;
  releaseTime: string;
  sha1?: string;
  complianceLevel?: number;
};

export type VersionManifest = {
  latest: {
    release: string;
    snapshot: string;
  };
  versions: VersionManifestEntry[];
};

export type LoaderName = "forge" | "neoforge";

export type ModLoader = {
  name: LoaderName;
  version: string;
};

export type LoaderArtifact = {
  path?: string;
  sha1: string;
  size: number;
  url: string;
};

export type LoaderLibrary =
  | {
    kind: "downloads";
    name: string;
    downloads: { artifact: LoaderArtifact };
  }
  | {
    kind: "url";
    name: string;
    url?: string;
  };

export type LoaderRequirement = {
  uid: string;
  equals?: string;
  suggests?: string;
};

export type LoaderDist =
  | {
    kind: "current";
    libraries: LoaderLibrary[];
    mainClass: string;
    mavenFiles?: LoaderLibrary[];
    minecraftArguments?: string;
  }
  | {
    kind: "legacy";
    jarMods: LoaderLibrary[];
    fmlLibs?: LoaderLibrary[];
  };

export type LoaderManifest = {
  uid: string;
  name: string;
  version: string;
  releaseTime?: string;
  requires: LoaderRequirement[];
  traits?: string[];
  tweakers?: string[];
  dist: LoaderDist;
};

export type LoaderIndexEntry = {
  version: string;
  recommended: boolean;
  releaseTime?: string;
  requires: LoaderRequirement[];
  sha256?: string;
};

export type LoaderIndex = {
  uid: string;
  name: string;
  versions: LoaderIndexEntry[];
};

export type ModLoaderVersion = {
  version: string;
  recommended: boolean;
};
