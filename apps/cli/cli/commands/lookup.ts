/**
 * Lookup Command Implementation
 *
 * Builds the CEP index from a data directory and resolves one CEP.
 */

import { DATA_DIR } from "../../service/config";
import { describeCepInfo } from "../../service/report";
import {
    displaySection,
    formatKeyValue,
    logWarning,
} from "../../service/helpers/terminalUI";
import { loadIndexWithProgress } from "./build-index";

/**
 * Executes the lookup command.
 *
 * @param cep - CEP to resolve, 8 digits.
 * @param dataDir - Root of the unpacked distribution.
 * @returns Whether the CEP was found.
 */
export async function runLookupCommand(
    cep: string,
    dataDir: string = DATA_DIR,
): Promise<boolean> {
    const lookup = await loadIndexWithProgress(dataDir);

    displaySection(`Searching for CEP ${cep}`);
    const info = lookup.lookup(cep);
    if (info === undefined) {
        console.log(`CEP not found: ${cep}`);
        logWarning("The CEP may not exist or the data files may be incomplete.");
        return false;
    }

    for (const row of formatKeyValue(describeCepInfo(info))) {
        console.log(row);
    }
    return true;
}
