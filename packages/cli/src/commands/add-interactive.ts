import {
  customNameSchema,
  parseRepositoryName,
  repositoryNameSchema,
} from "@modgate/core";
import * as p from "@clack/prompts";
import { check } from "@/lib/zod-validator";
import { type AddOptions, type AddResult, addEntry } from "./add";

export type InteractiveAddOptions = Omit<
  AddOptions,
  "name" | "customName"
> & {
  name?: string;
  customName?: string;
};

function cancelled(): null {
  p.cancel("Cancelled");
  return null;
}

/**
 * Prompts for whatever the command line left out, then appends the entry.
 * Returns null when the user cancels.
 */
export async function addInteractive(
  options: InteractiveAddOptions
): Promise<AddResult | null> {
  p.intro("Add a repository to the registry");

  let name = options.name;
  if (!name) {
    const input = await p.text({
      message: "Repository (owner/repo)",
      placeholder: "Acme/my-mod",
      validate: check(repositoryNameSchema),
    });
    if (p.isCancel(input)) return cancelled();
    name = input.trim();
  }

  let customName = options.customName;
  if (!customName) {
    const suggested = parseRepositoryName(name)?.repo ?? name;
    const input = await p.text({
      message: "Display name (custom_name)",
      placeholder: suggested,
      defaultValue: suggested,
      validate: (value) => (value ? check(customNameSchema)(value) : undefined),
    });
    if (p.isCancel(input)) return cancelled();
    customName = input;
  }

  let description = options.description;
  if (description === undefined) {
    const input = await p.text({
      message: "Description (leave empty to use the GitHub description)",
      placeholder: "",
      defaultValue: "",
    });
    if (p.isCancel(input)) return cancelled();
    description = input;
  }

  const result = await addEntry({ ...options, name, customName, description });
  p.outro(result.dryRun ? "Dry run complete" : `Added ${result.entry.name}`);
  return result;
}
