/**
 * Parse Command Implementation
 *
 * Parses a single eDNE file and prints its records grouped by state.
 */

import { readSourceFile } from "../../service/helpers/fs";
import { REPORT_SAMPLE_SIZE } from "../../service/config";
import {
    type ParsedSource,
    parseSource,
    RECORD_TYPE_PLURALS,
    type RecordTypeName,
} from "../../service/recordTypes";
import { buildParseReport, type ParseReport } from "../../service/report";
import {
    displaySection,
    failSpinner,
    formatDuration,
    formatKeyValue,
    formatNumber,
    formatState,
    startSpinner,
    succeedSpinner,
    theme,
    updateSpinner,
} from "../../service/helpers/terminalUI";

const printReport = (report: ParseReport): void => {
    displaySection(`${report.label} by state`);
    for (const state of report.states) {
        console.log();
        console.log(
            `${formatState(state.uf)} ${theme.muted(`(${formatNumber(state.count)} ${report.label})`)}`,
        );
        for (const line of state.lines) {
            console.log(`  ${line}`);
        }
        if (state.remaining > 0) {
            console.log(
                theme.muted(`  ... and ${formatNumber(state.remaining)} more`),
            );
        }
    }

    displaySection("Summary");
    for (const table of report.summary) {
        console.log(`  ${theme.bold(table.title)}`);
        for (const row of formatKeyValue(table.values, 4)) {
            console.log(row);
        }
    }
};

/**
 * Executes the parse command.
 *
 * @param type - Record kind of the file.
 * @param filePath - File to parse.
 * @throws {ParseError} When a line fails to parse.
 */
export async function runParseCommand(
    type: RecordTypeName,
    filePath: string,
): Promise<void> {
    const startTime = Date.now();
    const label = RECORD_TYPE_PLURALS[type];

    startSpinner(`Reading ${filePath}`);
    let source: ParsedSource;
    try {
        const bytes = await readSourceFile(filePath);
        updateSpinner(`Parsing ${label}`);
        source = parseSource(type, bytes);
    } catch (err) {
        failSpinner(`Could not parse ${filePath}`);
        throw err;
    }
    succeedSpinner(
        `Parsed ${formatNumber(source.collection.size)} ${label} in ${formatDuration(Date.now() - startTime)}`,
    );

    printReport(buildParseReport(source, REPORT_SAMPLE_SIZE));
}
