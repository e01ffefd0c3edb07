#!/usr/bin/env node

/**
 * binpatch - create, apply and inspect binary patches
 *
 * - create: diff an original and a modified file into an IPS, BPS or UPS patch
 * - apply: rebuild the modified file from the original and a patch
 * - inspect: print a patch's header, checksums and records
 *
 * Usage: binpatch <command> [options]
 * Example: binpatch create game.bin game-fixed.bin fix.bps
 */

import { runApply } from "./commands/apply.js";
import { runCreate } from "./commands/create.js";
import { runInspect } from "./commands/inspect.js";
import { bold, dim, EXIT_CODES, fatal } from "./shared.js";

interface CommandInfo {
  description: string;
  usage: string;
  run: (args: string[]) => Promise<void>;
}

const commands: Record<string, CommandInfo> = {
  create: {
    description: "Create a patch from an original and a modified file",
    usage:
      "create <original> <modified> <patch> [--format simple|delta|ups] [--metadata <file>] [--window <n>] [--min-match <n>] [--validate]",
    run: runCreate,
  },
  apply: {
    description: "Apply a patch to an original file",
    usage: "apply <original> <patch> <output> [--no-truncate]",
    run: runApply,
  },
  inspect: {
    description: "Show what a patch contains",
    usage: "inspect <patch> [--records <n>]",
    run: runInspect,
  },
};

function printHelp(): void {
  console.log(`
${bold("binpatch")}
${dim("Binary patches in IPS (simple), BPS (delta) and UPS formats")}

${bold("Usage:")} binpatch <command> [options]

${bold("Commands:")}
`);

  const maxCmdLen = Math.max(...Object.keys(commands).map((c) => c.length));

  for (const [name, info] of Object.entries(commands)) {
    console.log(`  ${name.padEnd(maxCmdLen + 2)} ${dim(info.description)}`);
  }

  console.log(`
${bold("Examples:")}
  binpatch create base.bin mod.bin mod.ips --format=simple   # Offset/length records
  binpatch create base.bin mod.bin mod.bps --validate        # Checksummed delta
  binpatch apply base.bin mod.bps out.bin                    # Rebuild mod.bin
  binpatch inspect mod.bps                                   # Show header and checksums

${bold("Exit codes:")}
  ${EXIT_CODES.usage} usage or I/O error    ${EXIT_CODES.format} invalid patch    ${EXIT_CODES.capacity} format capacity exceeded
  ${EXIT_CODES.sourceMismatch} wrong original file    ${EXIT_CODES.corrupt} corrupt patch    ${EXIT_CODES.validation} validation failed

Run ${bold("binpatch <command> --help")} for more information on a command.
`);
}

function printCommandHelp(info: CommandInfo): void {
  console.log(`
${bold("Usage:")} binpatch ${info.usage}

${info.description}
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    printHelp();
    return;
  }

  const cmdName = args[0];
  const cmdArgs = args.slice(1);
  const cmd = commands[cmdName];

  if (!cmd) {
    console.error(`binpatch: '${cmdName}' is not a command. See 'binpatch --help'.`);
    process.exit(EXIT_CODES.usage);
  }

  if (cmdArgs.includes("--help") || cmdArgs.includes("-h")) {
    printCommandHelp(cmd);
    return;
  }

  try {
    await cmd.run(cmdArgs);
  } catch (err) {
    fatal(err);
  }
}

main().catch((err) => {
  console.error("Unexpected error:", err);
  process.exit(1);
});
