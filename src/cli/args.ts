/**
 * Move a config folder given ahead of the command behind it, so each command
 * parses it as its own option
 */
export function splitGlobalArgs(args: string[]): {
  command: string | undefined;
  rest: string[];
} {
  const global: string[] = [];
  let index = 0;

  while (index < args.length) {
    const arg = args[index] ?? "";
    if (arg === "-c" || arg === "--config-folder") {
      global.push(arg, args[index + 1] ?? "");
      index += 2;
    } else if (arg.startsWith("--config-folder=")) {
      global.push(arg);
      index += 1;
    } else {
      break;
    }
  }

  return { command: args[index], rest: [...args.slice(index + 1), ...global] };
}
