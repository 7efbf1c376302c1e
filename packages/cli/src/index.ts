#!/usr/bin/env node

import {
  countBySeverity,
  getDisplayName,
  previewModification,
  type ValidationReport,
} from "@modgate/core";
import { Command } from "commander";
import { createRequire } from "module";
import { addEntry } from "@/commands/add";
import { addInteractive } from "@/commands/add-interactive";
import { checkRegistryFile } from "@/commands/check";
import { diffRegistryFiles } from "@/commands/diff";
import { gateRegistryFile } from "@/commands/gate";
import { validateRegistryFile } from "@/commands/validate";
import {
  type Config,
  DEFAULT_CONFIG,
  getGithubToken,
  loadConfig,
  parsePositiveInt,
} from "@/lib/config";
import { getErrorDetails, getErrorMessage } from "@/lib/errors";
import { log, ui } from "@/lib/log";

const require = createRequire(import.meta.url);
const packageJson = require("../package.json") as { version: string };

let config: Config = DEFAULT_CONFIG;

const program = new Command();

program
  .name("modgate")
  .description("Validator and merge gate for a community repositories.json")
  .version(packageJson.version)
  .option("-v, --verbose", "Enable verbose/debug output")
  .configureOutput({
    outputError: (str, write) => write(ui.error(str.trim())),
  })
  .hook("preAction", async (thisCommand) => {
    const opts = thisCommand.opts<{ verbose?: boolean }>();
    if (opts.verbose) {
      log.setVerbose(true);
    }
    config = await loadConfig();
  })
  .showHelpAfterError();

// =============================================================================
// validate - Check a registry file
// =============================================================================

program
  .command("validate")
  .description("Validate a registry file and report every violation")
  .argument("[file]", "Registry file (default: repositories.json)")
  .action(
    handle(async (file: string | undefined) => {
      const result = await validateRegistryFile({ path: file, config });

      printReport(result.report);
      printVerdict(result.filePath, result.report);

      if (!result.report.isAcceptable) {
        process.exitCode = 1;
      }
    })
  );

// =============================================================================
// diff - Compare two registry snapshots
// =============================================================================

program
  .command("diff")
  .description("Show entries added, removed or modified between two registries")
  .argument("<old>", "Accepted registry file")
  .argument("<new>", "Proposed registry file")
  .option("--no-preview", "Don't print a diff of each modified entry")
  .action(
    handle(
      async (oldPath: string, newPath: string, options: { preview: boolean }) => {
        const { changes } = await diffRegistryFiles({
          oldPath,
          newPath,
          config,
        });

        if (changes.added.length > 0) {
          log.print(ui.header("Added", changes.added.length));
          for (const entry of changes.added) {
            log.print(
              `  ${ui.symbols.add} ${entry.name}  ${ui.muted(getDisplayName(entry))}`
            );
          }
          log.print("");
        }

        if (changes.removed.length > 0) {
          log.print(ui.header("Removed", changes.removed.length));
          for (const entry of changes.removed) {
            log.print(`  ${ui.symbols.remove} ${entry.name}`);
          }
          log.print("");
        }

        if (changes.modified.length > 0) {
          log.print(ui.header("Modified", changes.modified.length));
          for (const modification of changes.modified) {
            log.print(
              `  ${ui.symbols.modify} ${modification.name}  ${ui.muted(modification.changedFields.join(", "))}`
            );
            if (options.preview) {
              log.print(
                previewModification(modification)
                  .split("\n")
                  .map((line) => `    ${line}`)
                  .join("\n")
              );
            }
          }
          log.print("");
        }

        for (const warning of changes.warnings) {
          log.print(ui.violation(warning));
        }

        if (changes.isAdditive) {
          log.success(
            `Additive change ${ui.muted(`(${ui.plural(changes.added.length, "new entry")}, ${changes.unchanged} unchanged)`)}`
          );
        } else {
          log.warn("Existing entries were modified or removed, review needed");
        }
      }
    )
  );

// =============================================================================
// gate - Accept or reject a proposed registry
// =============================================================================

program
  .command("gate")
  .description("Validate a proposed registry and compare it with the accepted one")
  .argument("<candidate>", "Proposed registry file")
  .option("-b, --base <file>", "Currently accepted registry file")
  .action(
    handle(async (candidatePath: string, options: { base?: string }) => {
      const result = await gateRegistryFile({
        candidatePath,
        basePath: options.base,
        config,
      });

      printReport(result.report);

      if (result.changes) {
        log.info(
          ui.keyValue(
            "Changes",
            `${result.changes.added.length} added, ${result.changes.modified.length} modified, ${result.changes.removed.length} removed`
          )
        );
      }

      printVerdict(result.candidatePath, result.report);

      if (!result.isAcceptable) {
        process.exitCode = 1;
      }
    })
  );

// =============================================================================
// check - Confirm listed repositories still exist
// =============================================================================

program
  .command("check")
  .description("Check that every listed repository exists on GitHub")
  .argument("[file]", "Registry file (default: repositories.json)")
  .option("--timeout <ms>", "Per-request timeout in milliseconds", parsePositiveInt)
  .option("--concurrency <n>", "Requests in flight at once", parsePositiveInt)
  .action(
    handle(
      async (
        file: string | undefined,
        options: { timeout?: number; concurrency?: number }
      ) => {
        const controller = new AbortController();
        const onSigint = () => controller.abort();
        process.once("SIGINT", onSigint);

        const spinner = await log.spinner("Checking repositories...");

        try {
          const result = await checkRegistryFile({
            path: file,
            config: {
              ...config,
              check: {
                ...config.check,
                timeoutMs: options.timeout ?? config.check.timeoutMs,
                concurrency: options.concurrency ?? config.check.concurrency,
              },
            },
            token: getGithubToken(),
            signal: controller.signal,
            onResult: (item, done, total) => {
              spinner.update(`Checking repositories... ${done}/${total} (${item.name})`);
            },
          });
          spinner.stop();

          for (const item of result.results) {
            log.print(ui.livenessStatus(item));
          }
          log.print("");

          const { ok, missing } = result.counts;
          const incomplete =
            result.counts["rate-limited"] + result.counts.error;

          if (incomplete > 0) {
            log.warn(
              `${ui.plural(incomplete, "repository")} could not be checked${
                result.counts["rate-limited"] > 0
                  ? ui.muted(" (set GITHUB_TOKEN to raise the rate limit)")
                  : ""
              }`
            );
          }

          if (result.allPresent) {
            log.success(`${ok} of ${result.results.length} repositories found`);
          } else {
            log.error(`${ui.plural(missing, "repository")} not found`);
            process.exitCode = 1;
          }
        } catch (error) {
          spinner.stop();
          throw error;
        } finally {
          process.removeListener("SIGINT", onSigint);
        }
      }
    )
  );

// =============================================================================
// add - Append an entry
// =============================================================================

program
  .command("add")
  .description("Append a repository to the registry file")
  .argument("[name]", "Repository as owner/repo")
  .option("-n, --custom-name <label>", "Display name (custom_name)")
  .option("-d, --description <text>", "Description")
  .option("-f, --file <file>", "Registry file (default: repositories.json)")
  .option("-y, --yes", "Don't prompt for missing values")
  .option("--dry-run", "Validate the new entry without writing")
  .action(
    handle(
      async (
        name: string | undefined,
        options: {
          customName?: string;
          description?: string;
          file?: string;
          yes?: boolean;
          dryRun?: boolean;
        }
      ) => {
        const useInteractive = !options.yes && process.stdin.isTTY;

        if (useInteractive) {
          const result = await addInteractive({
            name,
            customName: options.customName,
            description: options.description,
            path: options.file,
            config,
            dryRun: options.dryRun,
          });
          if (result) {
            log.print(ui.keyValue("File", ui.path(result.filePath)));
            log.print(ui.keyValue("Entries", String(result.entryCount)));
          }
          return;
        }

        if (!name) {
          throw new Error("Repository name is required (e.g., Acme/my-mod)");
        }

        const result = await addEntry({
          name,
          customName: options.customName ?? name.split("/").pop() ?? name,
          description: options.description,
          path: options.file,
          config,
          dryRun: options.dryRun,
        });

        const verb = result.dryRun ? "Would add" : "Added";
        log.success(
          `${verb} ${ui.bold(result.entry.name)} ${ui.muted(`to ${result.filePath}`)}`
        );
        log.print(ui.keyValue("custom_name", result.entry.custom_name));
        log.print(ui.keyValue("url", result.entry.url));
        if (result.entry.description) {
          log.print(ui.keyValue("description", result.entry.description));
        }
      }
    )
  );

// =============================================================================
// Parse and run
// =============================================================================

program
  .parseAsync(process.argv)
  .then(() => {
    process.exit(process.exitCode ?? 0);
  })
  .catch((err) => {
    log.error(getErrorMessage(err));
    process.exit(1);
  });

// =============================================================================
// Helpers
// =============================================================================

function printReport(report: ValidationReport) {
  for (const violation of report.violations) {
    log.print(ui.violation(violation));
  }
}

function printVerdict(filePath: string, report: ValidationReport) {
  const { errors, warnings } = countBySeverity(report.violations);
  const summary = ui.muted(
    `(${ui.plural(report.entryCount, "entry")}, ${ui.plural(errors, "error")}, ${ui.plural(warnings, "warning")})`
  );

  if (report.isAcceptable) {
    log.success(`${ui.path(filePath)} is acceptable ${summary}`);
  } else {
    log.error(`${filePath} is not acceptable ${summary}`);
  }
}

function handle<TArgs extends unknown[]>(
  fn: (...args: TArgs) => Promise<void>
) {
  return async (...args: TArgs) => {
    try {
      await fn(...args);
    } catch (err) {
      log.error(getErrorMessage(err));
      for (const detail of getErrorDetails(err)) {
        log.print(`  ${detail}`);
      }
      process.exitCode = 1;
    }
  };
}
