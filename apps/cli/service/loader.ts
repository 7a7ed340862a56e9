import { CepLookupBuilder, type CepLookup, ParseError } from "@repo/edne-core";
import {
    type EdneSourceFile,
    edneSourceFiles,
    fileExists,
    readSourceFile,
} from "./helpers/fs";
import { logger } from "./index";
import { VERBOSE } from "./config";
import { type ParsedSource, parseSource } from "./recordTypes";

/**
 * A source file that failed to parse, prefixed with its path.
 */
export class SourceFileError extends Error {
    readonly filePath: string;
    readonly parseError: ParseError;

    constructor(filePath: string, parseError: ParseError) {
        super(`${filePath}: ${parseError.message}`, { cause: parseError });
        this.name = "SourceFileError";
        this.filePath = filePath;
        this.parseError = parseError;
    }
}

/**
 * A source file that was found and parsed.
 */
export interface LoadedSource extends EdneSourceFile {
    /** Records in the file, after duplicate ids collapsed */
    records: number;
    /** File size in bytes */
    bytes: number;
}

export interface LoadResult {
    lookup: CepLookup;
    sources: LoadedSource[];
}

const addToBuilder = (builder: CepLookupBuilder, source: ParsedSource): void => {
    switch (source.type) {
        case "locality":
            builder.addLocalities(source.collection);
            break;
        case "neighborhood":
            builder.addNeighborhoods(source.collection);
            break;
        case "address":
            builder.addAddresses(source.collection);
            break;
        case "big-user":
            builder.addBigUsers(source.collection);
            break;
        case "operational-unit":
            builder.addOperationalUnits(source.collection);
            break;
        case "cpc":
            builder.addCpcs(source.collection);
            break;
    }
};

/**
 * Loads every eDNE file present in a data directory and builds the CEP index.
 *
 * Files are read one at a time, in {@link edneSourceFiles} order; missing
 * files are skipped.
 *
 * @param dataDir - Root of the unpacked distribution.
 * @param onSource - Called after each file is parsed.
 * @returns The index and the files it was built from.
 * @throws {SourceFileError} When a present file fails to parse.
 */
export const loadDataDirectory = async (
    dataDir: string,
    onSource?: (source: LoadedSource) => void,
): Promise<LoadResult> => {
    const builder = new CepLookupBuilder();
    const sources: LoadedSource[] = [];

    for (const file of edneSourceFiles(dataDir)) {
        // Skip the files this distribution does not ship
        if (!(await fileExists(file.filePath))) {
            if (VERBOSE) logger(`skipping missing ${file.filePath}`);
            continue;
        }

        // Read and parse the whole file
        const bytes = await readSourceFile(file.filePath);
        let parsed: ParsedSource;
        try {
            parsed = parseSource(file.type, bytes);
        } catch (err) {
            if (err instanceof ParseError) {
                throw new SourceFileError(file.filePath, err);
            }
            throw err;
        }

        // Hand the records to the builder and report the file
        addToBuilder(builder, parsed);
        const loaded: LoadedSource = {
            ...file,
            records: parsed.collection.size,
            bytes: bytes.byteLength,
        };
        sources.push(loaded);
        onSource?.(loaded);
    }

    // Merge everything into the index
    logger(`loaded ${sources.length} files from ${dataDir}`);
    return { lookup: builder.build(), sources };
};
