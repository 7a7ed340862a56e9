#!/usr/bin/env node
/**
 * eDNE CLI
 *
 * Parses the Brazilian postal directory (eDNE) and resolves CEPs.
 *
 * Usage:
 *   edne parse <type> <file>      - Parse one eDNE file and report on it
 *   edne build-index [dir]        - Build the CEP index from a data directory
 *   edne lookup <cep> [dir]       - Resolve a CEP
 *   edne version                  - Display version information
 *
 * Options:
 *   -q, --quiet        Suppress spinners and decorative output
 *   -v, --version      Display version information
 *   -h, --help         Display help information
 */

import { version } from "@repo/edne-core";
import { Command, InvalidArgumentError } from "commander";
import * as dotenv from "dotenv";
import { error } from "../service";
import {
    displayBanner,
    logError,
    setQuietMode,
    theme,
} from "../service/helpers/terminalUI";
import {
    type RecordTypeName,
    resolveRecordType,
} from "../service/recordTypes";

// Load environment variables before any command module reads its configuration
dotenv.config();

/**
 * Reports a command failure and exits. The stack trace goes to the `error`
 * debug namespace.
 */
const fail = (message: string, err: unknown): never => {
    error(err);
    logError(err instanceof Error ? `${message}: ${err.message}` : message);
    process.exit(1);
};

/**
 * Commander argument parser for record type names and their aliases.
 */
const parseRecordTypeArgument = (value: string): RecordTypeName => {
    const type = resolveRecordType(value);
    if (type === undefined) {
        throw new InvalidArgumentError(
            "Expected one of locality, neighborhood, address, biguser, opunit, cpc.",
        );
    }
    return type;
};

const program = new Command();

program
    .name("edne")
    .description(
        theme.muted("Brazilian postal directory (eDNE) parser and CEP lookup"),
    )
    .version(version, "-v, --version", "Display version information")
    .helpOption("-h, --help", "Display help information")
    .option("-q, --quiet", "Suppress spinners and decorative output", false)
    .hook("preAction", (thisCommand) => {
        const quiet = Boolean(thisCommand.opts().quiet);
        setQuietMode(quiet);
        displayBanner(version);
    });

/**
 * Parse Command - Parses one eDNE file.
 */
program
    .command("parse")
    .description("Parse one eDNE file and print its records by state")
    .argument(
        "<type>",
        "Record type: locality, neighborhood, address, biguser, opunit or cpc",
        parseRecordTypeArgument,
    )
    .argument("<file>", "Path to the eDNE file, e.g. LOG_LOCALIDADE.TXT")
    .action(async (type: RecordTypeName, file: string) => {
        try {
            const { runParseCommand } = await import("./commands/parse");
            await runParseCommand(type, file);
        } catch (err) {
            fail(`Failed to parse ${file}`, err);
        }
    });

/**
 * Build-Index Command - Builds the CEP index from a data directory.
 */
program
    .command("build-index")
    .description("Build the CEP index from an eDNE data directory")
    .argument("[dir]", "eDNE data directory (default: $EDNE_DATA_DIR or data)")
    .action(async (dir: string | undefined) => {
        try {
            const { runBuildIndexCommand } = await import(
                "./commands/build-index"
            );
            await runBuildIndexCommand(dir);
        } catch (err) {
            fail("Failed to build the CEP index", err);
        }
    });

/**
 * Lookup Command - Resolves one CEP. Exits with code 2 when it is not found.
 */
program
    .command("lookup")
    .description("Resolve a CEP against an eDNE data directory")
    .argument("<cep>", "CEP to resolve, 8 digits")
    .argument("[dir]", "eDNE data directory (default: $EDNE_DATA_DIR or data)")
    .action(async (cep: string, dir: string | undefined) => {
        try {
            const { runLookupCommand } = await import("./commands/lookup");
            const found = await runLookupCommand(cep, dir);
            if (!found) process.exitCode = 2;
        } catch (err) {
            fail(`Failed to look up ${cep}`, err);
        }
    });

/**
 * Version Command - Displays detailed version information.
 */
program
    .command("version")
    .description("Display detailed version and environment information")
    .action(async () => {
        const { printVersion } = await import("../service/printVersion");
        printVersion();
    });

// Show banner and help if no command provided
if (process.argv.length === 2) {
    displayBanner(version);
    program.outputHelp();
    process.exit(0);
}

program.parseAsync(process.argv).catch((err: unknown) => {
    fail("Unexpected error", err);
});
