import type { CommandName } from '../index';

export class HelpSystem {
  displayHelp(command?: CommandName): void {
    switch (command) {
      case 'eval':
        this.displayEvalHelp();
        return;
      case 'repl':
        this.displayReplHelp();
        return;
      case 'watch':
        this.displayWatchHelp();
        return;
      default:
        this.displayMainHelp();
    }
  }

  private displayEvalHelp(): void {
    console.log(`
Usage: livens eval <file|module>...

Evaluates each file, or loads each dotted module name from the module roots,
in the order given, and prints the namespace each one entered.

Examples:
  livens eval app/main.js
  livens --root src eval app.main app.util
    `);
  }

  private displayReplHelp(): void {
    console.log(`
Usage: livens repl [--module <name>]

Evaluates one line at a time inside the current module (default: user).

REPL commands:
  :in <module>   Switch the current module
  :load <file>   Evaluate a file and switch to the module it entered
  :exports       List the exports of the current module
  :quit          Leave the REPL
    `);
  }

  private displayWatchHelp(): void {
    console.log(`
Usage: livens watch [<file|module>...]

Evaluates the given inputs, then re-evaluates any module under the module
roots whose file changes. Stop with Ctrl-C.
    `);
  }

  private displayMainHelp(): void {
    console.log(`
Usage: livens [options] <command> [inputs]

Commands:
  eval <file|module>...   Evaluate files or modules in order
  repl                    Evaluate forms interactively
  watch [inputs]          Re-evaluate modules when their files change

Options:
  -r, --root <dir>        Module root (repeatable; replaces configured roots)
  -c, --config <dir>      Directory holding livens.config.json [default: cwd]
  -m, --module <name>     Starting module for repl [default: user]
  -d, --debug             Debug logging and stack traces
  -V, --version           Show version
  -h, --help              Show help (add a command for details)

Configuration is read from ~/.config/livens.json and ./livens.config.json.
    `);
  }
}
