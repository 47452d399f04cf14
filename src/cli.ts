import { Argument, Command, Option } from "commander";
import { existsSync, readFileSync } from "fs";
import { fileURLToPath } from "url";
import { initCommand } from "./commands/init.js";
import { addCommand } from "./commands/add.js";
import { changeCommand } from "./commands/change.js";
import { removeCommand } from "./commands/remove.js";
import { listCommand } from "./commands/list.js";
import { updateCommand } from "./commands/update.js";
import { configCommand } from "./commands/config.js";
import { completionsCommand } from "./commands/completions.js";
import { COMPLETION_SHELLS } from "./lib/completions.js";
import { packageJsonSchema } from "./lib/schema.js";

// Sources run from src/, the build from dist/src/.
export function readVersion(): string {
  for (const candidate of ["../package.json", "../../package.json"]) {
    const file = fileURLToPath(new URL(candidate, import.meta.url));
    if (existsSync(file)) {
      return packageJsonSchema.parse(JSON.parse(readFileSync(file, "utf-8"))).version;
    }
  }
  return "0.0.0";
}

const GIT_MODES = ["fresh", "preserve", "no-git"];
const WRITE_MODES = ["strict", "no-overwrite", "skip-overwrite", "overwrite", "ask"];
const SYMLINK_MODES = ["default", "literal", "resolve"];

export function createProgram(): Command {
  const program = new Command();

  program
    .name("templative")
    .description("Create projects from registered directory templates")
    .version(readVersion(), "-v, --version");

  program
    .command("init <template> [target]")
    .description("Create a project from a template (target defaults to the current directory)")
    .addOption(new Option("-g, --git <mode>", "git mode").choices(GIT_MODES))
    .addOption(new Option("-w, --write-mode <mode>", "collision policy").choices(WRITE_MODES))
    .option("-e, --exclude <patterns...>", "exclude patterns (replaces template and config lists)")
    .addOption(new Option("-s, --symlinks <mode>", "symlink handling").choices(SYMLINK_MODES))
    .option("--git-ref <ref>", "branch, tag or commit of a URL template")
    .option("--no-cache", "clone URL templates into a temporary directory")
    .option("--refresh", "fetch the cached copy before using it")
    .action(initCommand);

  program
    .command("add [location]")
    .description("Register a local directory or git URL as a template")
    .option("-n, --name <name>", "template name (defaults to the directory or repository name)")
    .option("-d, --description <text>", "description shown by list")
    .option("--git-ref <ref>", "branch, tag or commit of a URL template")
    .addOption(new Option("-g, --git <mode>", "git mode").choices(GIT_MODES))
    .addOption(new Option("-w, --write-mode <mode>", "collision policy").choices(WRITE_MODES))
    .option("-e, --exclude <patterns...>", "exclude patterns")
    .addOption(new Option("-s, --symlinks <mode>", "symlink handling").choices(SYMLINK_MODES))
    .option("--no-cache", "never cache this template")
    .option("--pre-init <command>", "command run in the template before copying")
    .option("--post-init <command>", "command run in the new project after copying")
    .action(addCommand);

  program
    .command("change <template>")
    .description("Change a registered template ('none' clears an override)")
    .option("--name <name>", "rename the template")
    .option("--description <text>", "description")
    .option("--location <location>", "directory or git URL")
    .option("--git-ref <ref>", "git ref")
    .addOption(new Option("--git <mode>", "git mode").choices([...GIT_MODES, "none"]))
    .addOption(new Option("--write-mode <mode>", "collision policy").choices([...WRITE_MODES, "none"]))
    .option("--exclude <patterns...>", "exclude patterns")
    .addOption(new Option("--symlinks <mode>", "symlink handling").choices([...SYMLINK_MODES, "none"]))
    .addOption(new Option("--cache <value>", "cache this template").choices(["true", "false", "none"]))
    .option("--pre-init <command>", "pre-init hook")
    .option("--post-init <command>", "post-init hook")
    .action(changeCommand);

  program
    .command("remove <templates...>")
    .alias("rm")
    .description("Remove templates from the registry (template files are kept)")
    .option("-y, --yes", "skip confirmation")
    .action(removeCommand);

  program
    .command("list")
    .alias("ls")
    .description("List registered templates")
    .option("--names-only", "print only template names")
    .action(listCommand);

  program
    .command("update [template]")
    .description("Move cached URL templates to the remote's current commit")
    .option("--check", "only report which templates have updates")
    .action(updateCommand);

  program
    .command("config")
    .description("Show the configuration file and effective defaults")
    .option("-p, --path", "print only the config file path")
    .action(configCommand);

  program
    .command("completions")
    .description("Print a shell completion script")
    .addArgument(new Argument("<shell>", "target shell").choices(COMPLETION_SHELLS))
    .option("--check <path>", "compare an installed script's version with this release")
    .action((shell: string, options: { check?: string }) => completionsCommand(program, shell, options));

  return program;
}
