import type { Command, Option } from "commander";
import { CompletionsError } from "./errors.js";

/** Bumped whenever generated scripts change in a way installed copies should pick up. */
export const COMPLETIONS_VERSION = 1;

export const COMPLETION_SHELLS = ["zsh", "bash", "fish", "powershell"] as const;
export type CompletionShell = (typeof COMPLETION_SHELLS)[number];

const VERSION_PREFIX = "# templative-completions-version: ";
const TEMPLATE_NAMES = "templative list --names-only 2>/dev/null";
const TEMPLATE_ARGS = new Set(["template", "templates"]);
const PATH_ARGS = new Set(["target", "location", "path", "file", "dir"]);

export type ValueKind =
  | { kind: "none" }
  | { kind: "text" }
  | { kind: "path" }
  | { kind: "template" }
  | { kind: "choices"; choices: string[] };

export interface FlagSpec {
  flags: string[];
  description: string;
  value: ValueKind;
}

export interface ArgSpec {
  name: string;
  variadic: boolean;
  value: ValueKind;
}

export interface CommandSpec {
  names: string[];
  description: string;
  flags: FlagSpec[];
  args: ArgSpec[];
}

export interface CompletionTree {
  commands: CommandSpec[];
  globalFlags: FlagSpec[];
}

const HELP_FLAG: FlagSpec = { flags: ["-h", "--help"], description: "display help", value: { kind: "none" } };

function valueFor(name: string, choices: readonly string[] | undefined): ValueKind {
  if (choices && choices.length > 0) return { kind: "choices", choices: [...choices] };
  if (TEMPLATE_ARGS.has(name)) return { kind: "template" };
  if (PATH_ARGS.has(name)) return { kind: "path" };
  return { kind: "text" };
}

function flagSpec(option: Option): FlagSpec {
  const flags = [option.short, option.long].filter((flag): flag is string => flag !== undefined);
  if (!option.required && !option.optional) {
    return { flags, description: option.description, value: { kind: "none" } };
  }
  const placeholder = /[<[]([^>\].]+)/.exec(option.flags)?.[1] ?? "";
  return { flags, description: option.description, value: valueFor(placeholder, option.argChoices) };
}

/** Reads commands, aliases, flags and positional arguments off a commander program. */
export function readCompletionTree(program: Command): CompletionTree {
  const commands = program.commands
    .filter(command => command.name() !== "help")
    .map(
      (command): CommandSpec => ({
        names: [command.name(), ...command.aliases()],
        description: command.description(),
        flags: [...command.options.filter(option => !option.hidden).map(flagSpec), HELP_FLAG],
        args: command.registeredArguments.map(arg => ({
          name: arg.name(),
          variadic: arg.variadic,
          value: valueFor(arg.name(), arg.argChoices),
        })),
      })
    );
  return { commands, globalFlags: [...program.options.map(flagSpec), HELP_FLAG] };
}

function allFlags(flags: readonly FlagSpec[]): string[] {
  return flags.flatMap(flag => flag.flags);
}

function valuedFlags(flags: readonly FlagSpec[]): FlagSpec[] {
  return flags.filter(flag => flag.value.kind !== "none");
}

function topLevelWords(tree: CompletionTree): string[] {
  return [...tree.commands.flatMap(command => command.names), ...allFlags(tree.globalFlags)];
}

// bash

function bashReply(value: ValueKind): string {
  switch (value.kind) {
    case "choices":
      return `COMPREPLY=($(compgen -W "${value.choices.join(" ")}" -- "$cur"))`;
    case "template":
      return `COMPREPLY=($(compgen -W "$(${TEMPLATE_NAMES})" -- "$cur"))`;
    case "path":
      return 'COMPREPLY=($(compgen -f -- "$cur"))';
    default:
      return "COMPREPLY=()";
  }
}

function bashCommand(command: CommandSpec): string[] {
  const valued = valuedFlags(command.flags);
  const lines = [
    `    ${command.names.join("|")})`,
    `      local valued=" ${allFlags(valued).join(" ")} "`,
    "      local positional=0 i",
    "      for (( i = 2; i < COMP_CWORD; i++ )); do",
    '        if [[ "$valued" == *" ${COMP_WORDS[i]} "* ]]; then',
    "          i=$((i + 1))",
    '        elif [[ "${COMP_WORDS[i]}" != -* ]]; then',
    "          positional=$((positional + 1))",
    "        fi",
    "      done",
    '      case "$prev" in',
    ...valued.map(flag => `        ${flag.flags.join("|")}) ${bashReply(flag.value)}; return ;;`),
    "      esac",
    '      if [[ "$cur" == -* ]]; then',
    `        COMPREPLY=($(compgen -W "${allFlags(command.flags).join(" ")}" -- "$cur"))`,
  ];
  command.args.forEach((arg, index) => {
    const test = arg.variadic ? "-ge" : "-eq";
    lines.push(`      elif [[ $positional ${test} ${index} ]]; then`, `        ${bashReply(arg.value)}`);
  });
  lines.push("      fi", "      ;;");
  return lines;
}

function bashScript(tree: CompletionTree): string {
  return [
    `${VERSION_PREFIX}${COMPLETIONS_VERSION}`,
    "",
    "_templative() {",
    '  local cur="${COMP_WORDS[COMP_CWORD]}"',
    '  local prev="${COMP_WORDS[COMP_CWORD-1]}"',
    "",
    "  if [[ $COMP_CWORD -eq 1 ]]; then",
    `    COMPREPLY=($(compgen -W "${topLevelWords(tree).join(" ")}" -- "$cur"))`,
    "    return",
    "  fi",
    "",
    '  case "${COMP_WORDS[1]}" in',
    ...tree.commands.flatMap(bashCommand),
    "  esac",
    "}",
    "",
    "complete -F _templative templative",
    "",
  ].join("\n");
}

// zsh

function zshQuote(text: string): string {
  return text.replace(/'/g, "'\\''");
}

function zshDescription(text: string): string {
  return zshQuote(text).replace(/[[\]:]/g, match => `\\${match}`);
}

function zshAction(value: ValueKind): string {
  switch (value.kind) {
    case "choices":
      return `(${value.choices.join(" ")})`;
    case "template":
      return "_templative_templates";
    case "path":
      return "_files";
    default:
      return " ";
  }
}

function zshCommand(command: CommandSpec): string[] {
  const specs = command.flags.flatMap(flag =>
    flag.flags.map(name => {
      const head = `${name}[${zshDescription(flag.description)}]`;
      return flag.value.kind === "none" ? `'${head}'` : `'${head}:value:${zshAction(flag.value)}'`;
    })
  );
  command.args.forEach((arg, index) => {
    specs.push(`'${arg.variadic ? "*" : String(index + 1)}:${arg.name}:${zshAction(arg.value)}'`);
  });
  return [`    ${command.names.join("|")})`, `      _arguments \\\n        ${specs.join(" \\\n        ")}`, "      ;;"];
}

function zshScript(tree: CompletionTree): string {
  const described = tree.commands.flatMap(command =>
    command.names.map(name => `    '${name}:${zshQuote(command.description)}'`)
  );
  return [
    "#compdef templative",
    `${VERSION_PREFIX}${COMPLETIONS_VERSION}`,
    "",
    "_templative_templates() {",
    "  local -a names",
    `  names=(\${(f)"$(${TEMPLATE_NAMES})"})`,
    "  compadd -a names",
    "}",
    "",
    "_templative() {",
    "  local -a commands",
    "  commands=(",
    ...described,
    "  )",
    "",
    "  if (( CURRENT == 2 )); then",
    "    _describe 'command' commands",
    `    compadd -- ${allFlags(tree.globalFlags).join(" ")}`,
    "    return",
    "  fi",
    "",
    "  shift words",
    "  (( CURRENT-- ))",
    "",
    '  case "${words[1]}" in',
    ...tree.commands.flatMap(zshCommand),
    "  esac",
    "}",
    "",
    "compdef _templative templative",
    "",
  ].join("\n");
}

// fish

function fishQuote(text: string): string {
  return `'${text.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

function fishValue(value: ValueKind): string {
  switch (value.kind) {
    case "choices":
      return ` -x -a ${fishQuote(value.choices.join(" "))}`;
    case "template":
      return ` -x -a ${fishQuote(`(${TEMPLATE_NAMES})`)}`;
    case "path":
      return " -r -F";
    case "text":
      return " -x";
    default:
      return "";
  }
}

function fishFlag(condition: string, flag: FlagSpec): string {
  const names = flag.flags
    .map(name => (name.startsWith("--") ? ` -l ${name.slice(2)}` : ` -s ${name.slice(1)}`))
    .join("");
  return `complete -c templative -n ${condition}${names}${fishValue(flag.value)} -d ${fishQuote(flag.description)}`;
}

function fishCommand(command: CommandSpec): string[] {
  const condition = fishQuote(`__fish_seen_subcommand_from ${command.names.join(" ")}`);
  const lines = command.flags.map(flag => fishFlag(condition, flag));
  for (const arg of command.args) {
    if (arg.value.kind === "path") {
      lines.push(`complete -c templative -n ${condition} -F`);
    } else if (arg.value.kind === "choices" || arg.value.kind === "template") {
      lines.push(`complete -c templative -n ${condition}${fishValue(arg.value)}`);
    }
  }
  return lines;
}

function fishScript(tree: CompletionTree): string {
  return [
    `${VERSION_PREFIX}${COMPLETIONS_VERSION}`,
    "",
    "complete -c templative -f",
    ...tree.globalFlags.map(flag => fishFlag("__fish_use_subcommand", flag)),
    ...tree.commands.flatMap(command =>
      command.names.map(
        name => `complete -c templative -n __fish_use_subcommand -a ${name} -d ${fishQuote(command.description)}`
      )
    ),
    ...tree.commands.flatMap(fishCommand),
    "",
  ].join("\n");
}

// powershell

function psList(values: readonly string[]): string {
  return `@(${values.map(value => `'${value.replace(/'/g, "''")}'`).join(", ")})`;
}

function psCandidates(value: ValueKind): string {
  switch (value.kind) {
    case "choices":
      return psList(value.choices);
    case "template":
      return "@(templative list --names-only 2>$null)";
    default:
      return "@()";
  }
}

function psCommand(command: CommandSpec): string[] {
  const valued = valuedFlags(command.flags);
  const lines = [
    `        { ${psList(command.names)} -contains $_ } {`,
    `            $valued = ${psList(allFlags(valued))}`,
    "            $positional = 0",
    "            for ($i = 2; $i -lt $done; $i++) {",
    "                if ($valued -contains $words[$i]) { $i++ }",
    "                elseif ($words[$i] -notlike '-*') { $positional++ }",
    "            }",
    "            if ($false) { }",
    ...valued.map(
      flag => `            elseif (${psList(flag.flags)} -contains $previous) { $candidates = ${psCandidates(flag.value)} }`
    ),
    `            elseif ($wordToComplete -like '-*') { $candidates = ${psList(allFlags(command.flags))} }`,
  ];
  command.args.forEach((arg, index) => {
    const test = arg.variadic ? "-ge" : "-eq";
    lines.push(`            elseif ($positional ${test} ${index}) { $candidates = ${psCandidates(arg.value)} }`);
  });
  lines.push("            break", "        }");
  return lines;
}

function powershellScript(tree: CompletionTree): string {
  return [
    `${VERSION_PREFIX}${COMPLETIONS_VERSION}`,
    "",
    "Register-ArgumentCompleter -Native -CommandName templative -ScriptBlock {",
    "    param($wordToComplete, $commandAst, $cursorPosition)",
    "",
    "    $words = @($commandAst.CommandElements | ForEach-Object { $_.ToString() })",
    "    $done = if ($wordToComplete) { $words.Count - 1 } else { $words.Count }",
    "    $previous = $words[$done - 1]",
    "    $candidates = @()",
    "",
    "    if ($done -le 1) {",
    `        $candidates = ${psList(topLevelWords(tree))}`,
    "    } else {",
    "        switch ($words[1]) {",
    ...tree.commands.flatMap(psCommand).map(line => `    ${line}`),
    "        }",
    "    }",
    "",
    '    $candidates | Where-Object { $_ -like "$wordToComplete*" } | ForEach-Object {',
    "        [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)",
    "    }",
    "}",
    "",
  ].join("\n");
}

const GENERATORS: Record<CompletionShell, (tree: CompletionTree) => string> = {
  bash: bashScript,
  zsh: zshScript,
  fish: fishScript,
  powershell: powershellScript,
};

export function completionScript(tree: CompletionTree, shell: CompletionShell): string {
  return GENERATORS[shell](tree);
}

export function parseCompletionsVersion(contents: string): number | undefined {
  for (const line of contents.split("\n")) {
    if (!line.startsWith(VERSION_PREFIX)) continue;
    const version = Number.parseInt(line.slice(VERSION_PREFIX.length).trim(), 10);
    return Number.isNaN(version) ? undefined : version;
  }
  return undefined;
}

/**
 * Compares an installed script with the version this release generates.
 * Returns the success message; an unversioned, older or newer script throws.
 */
export function checkCompletions(contents: string, shell: CompletionShell, file: string): string {
  const installed = parseCompletionsVersion(contents);
  if (installed === undefined) {
    throw new CompletionsError("CompletionsUnversioned", `No version comment found in ${file}; unable to verify`);
  }
  if (installed < COMPLETIONS_VERSION) {
    throw new CompletionsError(
      "CompletionsOutdated",
      `Completion script is outdated (installed: v${installed}, current: v${COMPLETIONS_VERSION})\n` +
        `re-run: templative completions ${shell} > ${file}`
    );
  }
  if (installed > COMPLETIONS_VERSION) {
    throw new CompletionsError(
      "CompletionsOutdated",
      `Completion script version v${installed} is newer than current v${COMPLETIONS_VERSION} ` +
        "(installed from a newer version of templative?)"
    );
  }
  return `Completion script is up to date (v${installed})`;
}
