/**
 * Build-Index Command Implementation
 *
 * Loads an eDNE data directory, merges it into the CEP index and prints
 * per-state statistics.
 */

import * as path from "node:path";
import type { CepLookup } from "@repo/edne-core";
import { DATA_DIR, LOG_SUBDIR } from "../../service/config";
import { type LoadedSource, loadDataDirectory } from "../../service/loader";
import { formatStateCounts } from "../../service/report";
import { RECORD_TYPE_PLURALS } from "../../service/recordTypes";
import {
    displayKeyValue,
    displaySection,
    displaySubsection,
    failSpinner,
    formatBytes,
    formatDuration,
    formatNumber,
    logSuccess,
    logWarning,
    startSpinner,
    succeedSpinner,
    theme,
    updateSpinner,
} from "../../service/helpers/terminalUI";

const describeSource = (source: LoadedSource): string => {
    const what = `${formatNumber(source.records)} ${RECORD_TYPE_PLURALS[source.type]}`;
    const where = source.uf === undefined ? "" : ` (${source.uf})`;
    return `${what}${where} ${theme.muted(`${path.basename(source.filePath)}, ${formatBytes(source.bytes)}`)}`;
};

/**
 * Loads a data directory with progress output.
 *
 * @param dataDir - Root of the unpacked distribution.
 * @returns The CEP index.
 * @throws {SourceFileError} When a file fails to parse.
 */
export async function loadIndexWithProgress(dataDir: string): Promise<CepLookup> {
    const startTime = Date.now();

    displaySection("Configuration");
    displayKeyValue({
        "Data directory": path.resolve(dataDir),
        "Source files": path.join(dataDir, LOG_SUBDIR),
    });

    displaySection("Loading eDNE data");
    startSpinner("Reading source files");

    const loaded: LoadedSource[] = [];
    try {
        const result = await loadDataDirectory(dataDir, (source) => {
            loaded.push(source);
            updateSpinner(`Loaded ${describeSource(source)}`);
        });
        succeedSpinner(
            `Built index from ${loaded.length} files in ${formatDuration(Date.now() - startTime)}`,
        );
        for (const source of loaded) logSuccess(describeSource(source));
        if (loaded.length === 0) {
            logWarning(`No eDNE files found in ${path.join(dataDir, LOG_SUBDIR)}`);
        }
        return result.lookup;
    } catch (err) {
        failSpinner("Failed to load eDNE data");
        throw err;
    }
}

/**
 * Executes the build-index command.
 *
 * @param dataDir - Root of the unpacked distribution.
 */
export async function runBuildIndexCommand(
    dataDir: string = DATA_DIR,
): Promise<void> {
    const lookup = await loadIndexWithProgress(dataDir);

    displaySection("CEP index");
    console.log(`Total CEPs indexed: ${formatNumber(lookup.size)}`);
    displaySubsection("CEPs by state");
    for (const line of formatStateCounts(lookup)) {
        console.log(`  ${line}`);
    }
}
