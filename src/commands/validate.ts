import { diag, type Reporter } from "../output/reporter.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { resolveConfig, type ConfigOpts } from "./shared.js";

/** `dashctl validate`: load and check the layered config, nothing else. */
export function validate(opts: ConfigOpts & { reporter: Reporter }): ExitCode {
  const config = resolveConfig(opts, opts.reporter);
  if (!config) return EXIT.FAILURE;

  opts.reporter.emit(
    diag("info", "OK", `Config OK (schema ${config.schema_version}, port ${config.launch.port}, archive ${config.packaging.format})`),
  );
  return EXIT.SUCCESS;
}
