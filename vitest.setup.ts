/**
 * Vitest Global Setup
 *
 * Keeps the environment free of settings a developer shell may carry over
 * into config-loading tests.
 */
import { beforeEach } from "vitest";

const CODEBUNDLE_ENV_KEYS = ["CODEBUNDLE_LOG_LEVEL", "CODEBUNDLE_OVERWRITE", "CODEBUNDLE_EXTENSIONS"];

beforeEach(() => {
  for (const key of CODEBUNDLE_ENV_KEYS) {
    delete process.env[key];
  }
});
