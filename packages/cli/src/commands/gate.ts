import { type GateResult, gateRegistry, RegistryFormatError } from "@modgate/core";
import { type Config, DEFAULT_CONFIG } from "@/lib/config";
import { readRegistryFile } from "@/lib/fs";
import { log } from "@/lib/log";

export type GateOptions = {
  /** Proposed registry */
  candidatePath: string;
  /** Currently accepted registry, enables the additive-change check */
  basePath?: string;
  config?: Config;
};

export type GateFileResult = GateResult & {
  candidatePath: string;
  basePath: string | null;
};

export async function gateRegistryFile(
  options: GateOptions
): Promise<GateFileResult> {
  const config = options.config ?? DEFAULT_CONFIG;

  const candidateText = await readRegistryFile(options.candidatePath);
  const baseText = options.basePath
    ? await readRegistryFile(options.basePath)
    : undefined;

  log.debug(
    options.basePath
      ? `Gating ${options.candidatePath} against ${options.basePath}`
      : `Gating ${options.candidatePath} without a base`
  );

  try {
    const result = gateRegistry(candidateText, baseText, {
      hostBaseUrl: config.hostBaseUrl,
    });
    return {
      ...result,
      candidatePath: options.candidatePath,
      basePath: options.basePath ?? null,
    };
  } catch (error) {
    if (error instanceof RegistryFormatError && options.basePath) {
      throw new RegistryFormatError(
        `Base registry ${options.basePath} is not valid`,
        error.details
      );
    }
    throw error;
  }
}
