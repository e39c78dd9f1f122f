/**
 * Quick schema-less argument parser.
 *
 * For scripts that want flags and options without declaring anything.
 * Nothing is validated and unknown flags are kept.
 *
 * Supported formats:
 *   - Option with value: --file=foo.txt, --output out.txt, -o out.txt
 *   - Boolean flag: --verbose, -v, -abc (three flags)
 *   - Positional: everything else, including a lone "-"
 *
 * Examples:
 *   parseRawArgs(["tool", "--config", "./app.toml"]) → { command: "tool", options: { config: "./app.toml" }, ... }
 *   parseRawArgs(["tool", "-vo", "out.txt"]) → { flags: { v: true }, options: { o: "out.txt" }, ... }
 */

export interface RawArgs {
  /** First element of the vector, usually the program name. */
  command: string;
  positional: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

export function parseRawArgs(argv: readonly string[]): RawArgs {
  const [command = "", ...rest] = argv;
  const positional: string[] = [];
  // Null prototype: "__proto__" and "constructor" are ordinary keys here.
  const flags: Record<string, boolean> = Object.create(null);
  const options: Record<string, string> = Object.create(null);

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === undefined) break;
    const next = rest[i + 1];
    const lookahead = next !== undefined && !next.startsWith("-") ? next : undefined;

    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      const eq = key.indexOf("=");
      if (eq !== -1) {
        options[key.slice(0, eq)] = key.slice(eq + 1);
      } else if (lookahead !== undefined) {
        options[key] = lookahead;
        i++; // Skip the value
      } else {
        flags[key] = true;
      }
      continue;
    }

    if (arg.startsWith("-") && arg.length > 1) {
      const chars = Array.from(arg.slice(1));
      chars.forEach((char, position) => {
        if (position === chars.length - 1 && lookahead !== undefined) {
          options[char] = lookahead;
        } else {
          flags[char] = true;
        }
      });
      if (lookahead !== undefined) i++;
      continue;
    }

    positional.push(arg);
  }

  return { command, positional, flags, options };
}

export function hasFlag(args: RawArgs, name: string): boolean {
  return Object.hasOwn(args.flags, name) && args.flags[name] === true;
}

export function getOption(args: RawArgs, name: string): string | undefined {
  return Object.hasOwn(args.options, name) ? args.options[name] : undefined;
}
