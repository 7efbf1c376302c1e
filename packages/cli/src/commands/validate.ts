import { type ValidationReport, validateRegistry } from "@modgate/core";
import { type Config, DEFAULT_CONFIG } from "@/lib/config";
import { readRegistryFile } from "@/lib/fs";
import { log } from "@/lib/log";

export type ValidateOptions = {
  /** Registry file (defaults to the configured registry file) */
  path?: string;
  config?: Config;
};

export type ValidateResult = {
  filePath: string;
  report: ValidationReport;
};

export async function validateRegistryFile(
  options: ValidateOptions = {}
): Promise<ValidateResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const filePath = options.path ?? config.registryFile;

  log.debug(`Validating ${filePath}`);
  const text = await readRegistryFile(filePath);
  const report = validateRegistry(text, { hostBaseUrl: config.hostBaseUrl });
  log.debug(
    `Checked ${report.entryCount} record(s), found ${report.violations.length} violation(s)`
  );

  return { filePath, report };
}
