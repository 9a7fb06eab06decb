/** Failure taxonomy shared by the bootstrap and packaging pipelines. */
export type FailureCode =
  | "RUNTIME_MISSING"
  | "MANIFEST_MISSING"
  | "INSTALL_FAILED"
  | "LAUNCH_ABNORMAL"
  | "STAGING_FAILED"
  | "COPY_FAILED"
  | "SANITIZE_FAILED"
  | "REWRITE_FAILED"
  | "ARCHIVE_FAILED"
  | "CONFIG_INVALID"
  | "INVALID_ARGS";

export type PackagingStage = "stage" | "copy" | "sanitize" | "rewrite" | "archive";

export type Failure = {
  code: FailureCode;
  message: string;
  /** What the user should do next, printed verbatim. */
  remediation?: string;
  /** Set for packaging failures. */
  stage?: PackagingStage;
};

export const STAGE_FAILURE_CODES: Record<PackagingStage, FailureCode> = {
  stage: "STAGING_FAILED",
  copy: "COPY_FAILED",
  sanitize: "SANITIZE_FAILED",
  rewrite: "REWRITE_FAILED",
  archive: "ARCHIVE_FAILED",
};
