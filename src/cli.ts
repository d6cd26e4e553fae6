#!/usr/bin/env -S npx tsx
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config } from "./config";
import { errorMessage } from "./errors";
import { createLogger, logToStderr } from "./logger";
import { startMcpServer } from "./mcp";
import { checkFormulary, exportX12, generateMembers, generatePatients } from "./operations";
import type { Params } from "./params";
import { startServer } from "./server";
import { createOutputStore, saveOutput } from "./storage";

const log = createLogger("cli");

export const USAGE = `Usage: healthsim <command> [options]

Commands:
  patients              Generate clinical patients
      --count N --scenario ID --conditions a,b --age MIN-MAX --gender M|F
      --format json|fhir|hl7 --seed N --reference-date YYYY-MM-DD
  members               Generate health plan members
      --count N --plan CODE --with-claims --family --seed N
  x12 <transaction>     Export 834, 837p, 835, 270 or 271
      --count N --plan CODE --control-number N --seed N
  formulary <ndc>       Check formulary coverage for an NDC
      --formulary STD-COMMERCIAL|MEDICARE-PART-D
  serve                 Start the HTTP API (--port N)
  mcp                   Serve the MCP tools over stdio

Options:
  --out KEY             Write the result to the output store instead of stdout
`;

const ALIASES: Record<string, string> = {
  age: "ageRange",
  plan: "planCode",
  formulary: "formularyId",
};

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Params;
}

const camel = (flag: string): string => flag.replace(/-([a-z])/g, (_, ch: string) => ch.toUpperCase());

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Params = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf("=");
    const rawName = eq < 0 ? body : body.slice(0, eq);
    const inline = eq < 0 ? undefined : body.slice(eq + 1);
    const name = ALIASES[rawName] ?? camel(rawName);
    if (inline !== undefined) {
      flags[name] = inline;
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
      flags[name] = argv[++i];
    } else {
      flags[name] = "true";
    }
  }
  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

class UsageError extends Error {}

function render(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value, null, 2);
}

function commandOutput(command: string, positionals: string[], flags: Params): unknown {
  switch (command) {
    case "patients": {
      const result = generatePatients(flags);
      if (result.format === "hl7") return result.messages.join("\n\n");
      if (result.format === "fhir") return result.bundle;
      return result.patients;
    }
    case "members":
      return generateMembers(flags).members;
    case "x12": {
      const [transaction] = positionals;
      if (!transaction) throw new UsageError("x12 needs a transaction: 834, 837p, 835, 270 or 271");
      return exportX12(transaction, flags).content;
    }
    case "formulary": {
      const [ndc] = positionals;
      if (!ndc) throw new UsageError("formulary needs an NDC");
      return checkFormulary(ndc, flags);
    }
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/** Runs one command; resolves to the process exit code. */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  const { command, positionals, flags } = parseArgs(argv);
  if (!command || command === "help" || flags.help === "true") {
    io.stdout(USAGE);
    return command ? 0 : 1;
  }

  try {
    if (command === "serve") {
      const port = typeof flags.port === "string" ? Number(flags.port) : config.PORT;
      startServer({}, port);
      return 0;
    }
    if (command === "mcp") {
      logToStderr();
      await startMcpServer();
      return 0;
    }

    const output = render(commandOutput(command, positionals, flags));
    const out = typeof flags.out === "string" && flags.out !== "true" ? flags.out : undefined;
    if (out) {
      await saveOutput(createOutputStore(), out, output);
      io.stderr(`Wrote ${out} to ${config.OUTPUT_DIR}\n`);
    } else {
      io.stdout(output.endsWith("\n") ? output : `${output}\n`);
    }
    return 0;
  } catch (e) {
    if (e instanceof UsageError) {
      io.stderr(`${e.message}\n\n${USAGE}`);
      return 1;
    }
    io.stderr(`Error: ${errorMessage(e)}\n`);
    return 1;
  }
}

const invokedDirectly = process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  runCli(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exit(code);
    })
    .catch((e: unknown) => {
      log.error(errorMessage(e));
      process.exit(1);
    });
}
