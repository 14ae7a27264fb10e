/**
 * Shell completion generators.
 *
 * Each generator produces a self-contained script that can be sourced or
 * written to the shell's completions directory. Command words come from
 * the same table as the help output.
 *
 * @packageDocumentation
 */

import { SHELLS } from './commands';
import { CLI_NAME, COMMAND_USAGE, TOP_LEVEL_COMMANDS, subcommandsOf } from './usage';

// ─── Constants ────────────────────────────────────────────────────────────────

const GLOBAL_FLAGS = ['--path', '--json', '--no-color', '--verbose', '--help'] as const;

const GOVERNANCE_VALUES = ['true', 'false'] as const;

/** Top-level commands with subcommands (`create`, `sign`). */
function groups(): [string, string[]][] {
  return TOP_LEVEL_COMMANDS.map((cmd): [string, string[]] => [cmd, subcommandsOf(cmd)]).filter(
    ([, subs]) => subs.length > 0,
  );
}

function summaryOf(command: string): string {
  const own = COMMAND_USAGE.find((usage) => usage.name === command);
  if (own) return own.summary;
  return `${command[0]?.toUpperCase() ?? ''}${command.slice(1)} commands: ${subcommandsOf(command).join(', ')}`;
}

// ─── Bash ─────────────────────────────────────────────────────────────────────

/**
 * Generate a bash completion script.
 *
 * Registers `_tessera_completions` via `complete -F`; completes commands,
 * subcommands, global flags, `clean --hard`, `consensus --show` and shell
 * names.
 *
 * @example
 * ```bash
 * tessera completions bash > /etc/bash_completion.d/tessera
 * ```
 */
export function bashCompletions(): string {
  const subcommandCases = groups()
    .map(
      ([cmd, subs]) => `        ${cmd})
            if [[ \${COMP_CWORD} -eq 2 ]]; then
                COMPREPLY=( $(compgen -W "${subs.join(' ')}" -- "\${cur}") )
            else
                COMPREPLY=( $(compgen -W "\${global_flags}" -- "\${cur}") )
            fi
            ;;`,
    )
    .join('\n');

  return `# Bash completion for ${CLI_NAME}
# Source this file or copy to /etc/bash_completion.d/${CLI_NAME}

_${CLI_NAME}_completions() {
    local cur prev commands global_flags
    COMPREPLY=()
    cur="\${COMP_WORDS[COMP_CWORD]}"
    prev="\${COMP_WORDS[COMP_CWORD-1]}"

    commands="${TOP_LEVEL_COMMANDS.join(' ')}"
    global_flags="${GLOBAL_FLAGS.join(' ')}"

    if [[ "\${prev}" == "--path" ]]; then
        COMPREPLY=( $(compgen -d -- "\${cur}") )
        return 0
    fi

    if [[ \${COMP_CWORD} -eq 1 ]]; then
        COMPREPLY=( $(compgen -W "\${commands}" -- "\${cur}") )
        return 0
    fi

    case "\${COMP_WORDS[1]}" in
${subcommandCases}
        clean)
            COMPREPLY=( $(compgen -W "--hard \${global_flags}" -- "\${cur}") )
            ;;
        consensus)
            COMPREPLY=( $(compgen -W "--show \${global_flags}" -- "\${cur}") )
            ;;
        completions)
            COMPREPLY=( $(compgen -W "${SHELLS.join(' ')}" -- "\${cur}") )
            ;;
        *)
            COMPREPLY=( $(compgen -W "\${global_flags}" -- "\${cur}") )
            ;;
    esac
    return 0
}

complete -F _${CLI_NAME}_completions ${CLI_NAME}`;
}

// ─── Zsh ──────────────────────────────────────────────────────────────────────

/**
 * Generate a zsh completion script using `_arguments` and `_describe`.
 *
 * @example
 * ```bash
 * tessera completions zsh > ~/.zsh/completions/_tessera
 * ```
 */
export function zshCompletions(): string {
  const commandEntries = TOP_LEVEL_COMMANDS.map((cmd) => `        '${cmd}:${summaryOf(cmd)}'`).join('\n');
  const subcommandCases = groups()
    .map(([cmd, subs]) => `                ${cmd})
                    _arguments '1:subcommand:(${subs.join(' ')})'
                    ;;`)
    .join('\n');

  return `#compdef ${CLI_NAME}
# Zsh completion for ${CLI_NAME}
# Copy to a directory in your $fpath (e.g. ~/.zsh/completions/_${CLI_NAME})

_${CLI_NAME}() {
    local -a commands
    commands=(
${commandEntries}
    )

    _arguments -C \\
        '--path[Node directory holding config.json]:dir:_files -/' \\
        '--json[Machine-readable JSON output]' \\
        '--no-color[Disable colored output]' \\
        '--verbose[Debug logging on stderr]' \\
        '--help[Show help]' \\
        '1:command:->command' \\
        '*::arg:->args'

    case $state in
        command)
            _describe '${CLI_NAME} command' commands
            ;;
        args)
            case $words[1] in
${subcommandCases}
                clean)
                    _arguments '--hard[Also remove local work]'
                    ;;
                consensus)
                    _arguments '--show[Show the consensus status]'
                    ;;
                completions)
                    _arguments '1:shell:(${SHELLS.join(' ')})'
                    ;;
            esac
            ;;
    esac
}

_${CLI_NAME} "$@"`;
}

// ─── Fish ─────────────────────────────────────────────────────────────────────

/**
 * Generate a fish completion script.
 *
 * @example
 * ```fish
 * tessera completions fish > ~/.config/fish/completions/tessera.fish
 * ```
 */
export function fishCompletions(): string {
  const c = `complete -c ${CLI_NAME}`;
  const lines: string[] = [
    `# Fish completion for ${CLI_NAME}`,
    `# Copy to ~/.config/fish/completions/${CLI_NAME}.fish`,
    '',
    '# Disable file completions by default',
    `${c} -f`,
    '',
    '# Commands',
  ];

  for (const cmd of TOP_LEVEL_COMMANDS) {
    lines.push(
      `${c} -n "not __fish_seen_subcommand_from ${TOP_LEVEL_COMMANDS.join(' ')}" -a "${cmd}" -d "${summaryOf(cmd)}"`,
    );
  }

  lines.push('');
  lines.push('# Global flags');
  lines.push(`${c} -l path -r -a "(__fish_complete_directories)" -d "Node directory holding config.json"`);
  lines.push(`${c} -l json -d "Machine-readable JSON output"`);
  lines.push(`${c} -l no-color -d "Disable colored output"`);
  lines.push(`${c} -l verbose -d "Debug logging on stderr"`);
  lines.push(`${c} -l help -d "Show help"`);

  lines.push('');
  lines.push('# Subcommands');
  for (const [cmd, subs] of groups()) {
    for (const sub of subs) {
      const usage = COMMAND_USAGE.find((u) => u.name === `${cmd} ${sub}`);
      lines.push(`${c} -n "__fish_seen_subcommand_from ${cmd}" -a "${sub}" -d "${usage?.summary ?? sub}"`);
    }
  }

  lines.push('');
  lines.push('# Command flags');
  lines.push(`${c} -n "__fish_seen_subcommand_from clean" -l hard -d "Also remove local work"`);
  lines.push(`${c} -n "__fish_seen_subcommand_from consensus" -l show -d "Show the consensus status"`);

  lines.push('');
  lines.push('# Governance flag values');
  for (const value of GOVERNANCE_VALUES) {
    lines.push(`${c} -n "__fish_seen_subcommand_from tx-delegate" -a "${value}"`);
  }

  lines.push('');
  lines.push('# completions shell suggestions');
  for (const shell of SHELLS) {
    lines.push(`${c} -n "__fish_seen_subcommand_from completions" -a "${shell}" -d "${shell} shell"`);
  }

  return lines.join('\n');
}
