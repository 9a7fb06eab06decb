/** Configuration types: layered config system. */
export type ArchiveFormat = "zip" | "tar.gz";

export type RuntimeConfig = {
  /** Display name used in install instructions (e.g. "Python"). */
  name: string;
  /** Candidate executables, tried in order. */
  commands: readonly string[];
  version_args: readonly string[];
  min_version: string;
  /** Keyed by `process.platform`, with a `default` fallback. */
  install_hints: Readonly<Record<string, string>>;
};

export type DependenciesConfig = {
  manifest: string;
  /** Import name of the one package whose presence stands for the whole manifest. */
  sentinel: string;
  /** Arguments after the runtime command; the manifest path is appended. */
  install_args: readonly string[];
};

export type LaunchConfig = {
  entrypoint: string;
  port: number;
  headless: boolean;
  open_browser: boolean;
  browser_delay_ms: number;
};

export type CredentialRewriteConfig = {
  file: string;
  variable: string;
  env_var: string;
};

export type PackagingConfig = {
  output_dir: string;
  staging_root: string;
  format: ArchiveFormat;
  exclude: readonly string[];
  credential: CredentialRewriteConfig;
};

export type DashctlConfig = {
  schema_version: string;
  app_dir: string;
  runtime: RuntimeConfig;
  dependencies: DependenciesConfig;
  launch: LaunchConfig;
  packaging: PackagingConfig;
};
