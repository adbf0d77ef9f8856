#!/usr/bin/env tsx
import * as fs from "node:fs";
import { pathToFileURL } from "node:url";
import {
    type CheckName,
    type CheckOptions,
    formatReports,
    hasErrors,
    isCheckName,
    runChecks,
} from "./src/check";
import { deserializeFixture } from "./src/expr_deserialize";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type CliOptions = CheckOptions & {
    color: boolean;
};

// ---------------------------------------------------------------------------
// CLI — check
// ---------------------------------------------------------------------------

function printHelp(exitCode = 0): never {
    console.log("Fortran expression checks");
    console.log("");
    console.log("Usage: tsx main.ts check <fixture.json> [options]");
    console.log("");
    console.log("Options:");
    console.log("  --only <check>   Run one check: constant, initial-target,");
    console.log("                   specification or contiguous");
    console.log("  --no-color       Never color diagnostics");
    console.log("  -h, --help       Show this help");
    process.exit(exitCode);
}

function parseCheckArgs(
    args: string[],
): { options: CliOptions; inputFile?: string } | { error: string } {
    const options: CliOptions = { color: process.stderr.isTTY === true };
    let inputFile: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === "--only") {
            i++;
            if (i >= args.length) return { error: "missing value for --only" };
            const name: string = args[i];
            if (!isCheckName(name)) return { error: `unknown check '${name}'` };
            const only: CheckName = name;
            options.only = only;
        } else if (arg === "--no-color") {
            options.color = false;
        } else if (arg === "-h" || arg === "--help") {
            printHelp(0);
        } else if (arg.startsWith("-")) {
            return { error: `unknown option '${arg}'` };
        } else if (inputFile === undefined) {
            inputFile = arg;
        } else {
            return { error: `unexpected argument '${arg}'` };
        }
    }

    return { options, inputFile };
}

function readFixtureText(filePath: string): { ok: true; text: string } | { ok: false; message: string } {
    try {
        return { ok: true, text: fs.readFileSync(filePath, "utf8") };
    } catch (error) {
        return {
            ok: false,
            message: `failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        };
    }
}

function runCheckCli(args: string[]): number {
    if (args.length === 0) printHelp(1);

    const parsed = parseCheckArgs(args);
    if ("error" in parsed) {
        console.error(`error: ${parsed.error}`);
        return 1;
    }
    const { options, inputFile } = parsed;
    if (!inputFile) {
        console.error("error: no fixture file specified");
        return 1;
    }

    const read = readFixtureText(inputFile);
    if (!read.ok) {
        console.error(`error: ${read.message}`);
        return 1;
    }
    const fixture = deserializeFixture(read.text, inputFile);
    if (!fixture.ok) {
        const { message, path } = fixture.error;
        console.error(`error: ${inputFile}: ${message} at ${path}`);
        return 1;
    }

    const reports = runChecks(fixture.value, options);
    console.log(formatReports(reports, { color: options.color }));
    return hasErrors(reports) ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

function main(): void {
    const args = process.argv.slice(2);
    let exitCode: number;
    if (args[0] === "check") {
        exitCode = runCheckCli(args.slice(1));
    } else if (args[0] === "-h" || args[0] === "--help") {
        printHelp(0);
    } else {
        printHelp(1);
    }
    process.exit(exitCode);
}

export { parseCheckArgs, runCheckCli };

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
    main();
}
