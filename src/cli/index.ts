#!/usr/bin/env node
import { parseArgs } from "util";

import { checkDescriptions } from "./check";
import { generateFromDescriptions } from "./generate";

const HELP_TEXT = `
routewright - typed service contracts from OpenAPI 3.0 descriptions

Usage:
  routewright <command> [options]

Commands:
  generate [files...]    Generate model, api, dispatcher, server and client code
  check [files...]       Validate descriptions without writing anything

Generate Options:
  --outdir <directory>   Output directory (default: print a single unit to stdout)
  --single-file          Write one index.ts instead of five files
  --no-format            Skip formatting of the emitted code
  --base-url <url>       Default base URL of the generated client

Common Options:
  --debug                Print debug output to stderr

Examples:
  # Generate into a directory
  routewright generate petstore.yaml --outdir src/generated

  # Print everything as one module
  routewright generate petstore.yaml

  # Check every description under a directory
  routewright check specs/
`;

async function main() {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === "--help" || rawArgs[0] === "-h") {
        console.log(HELP_TEXT);
        process.exit(0);
    }

    const command = rawArgs[0];

    if (command === "generate") {
        const { values, positionals } = parseArgs({
            args: rawArgs.slice(1),
            options: {
                outdir: { type: "string" },
                "single-file": { type: "boolean", default: false },
                "no-format": { type: "boolean", default: false },
                "base-url": { type: "string" },
                debug: { type: "boolean", default: false },
            },
            allowPositionals: true,
        });

        if (positionals.length === 0) {
            console.error("Error: No files or directories specified");
            console.error("Usage: routewright generate [files|dirs|globs...] [--outdir <directory>]");
            process.exit(1);
        }

        await generateFromDescriptions(positionals, {
            outdir: values.outdir,
            singleFile: values["single-file"],
            format: !values["no-format"],
            baseUrl: values["base-url"],
            debug: values.debug,
        });
    } else if (command === "check") {
        const { values, positionals } = parseArgs({
            args: rawArgs.slice(1),
            options: {
                debug: { type: "boolean", default: false },
            },
            allowPositionals: true,
        });

        if (positionals.length === 0) {
            console.error("Error: No files or directories specified");
            console.error("Usage: routewright check [files|dirs|globs...]");
            process.exit(1);
        }

        await checkDescriptions(positionals, { debug: values.debug });
    } else if (command === "help") {
        console.log(HELP_TEXT);
    } else {
        console.error(`Error: Unknown command "${command}"`);
        console.error("");
        console.log(HELP_TEXT);
        process.exit(1);
    }
}

main().catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exit(1);
});
