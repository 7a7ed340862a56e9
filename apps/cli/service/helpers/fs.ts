import * as fs from "node:fs";
import * as path from "node:path";
import { type Uf, UFS } from "@repo/edne-core";
import { error, fsp, logger } from "../index";
import { LOG_SUBDIR, VERBOSE } from "../config";
import type { RecordTypeName } from "../recordTypes";

/**
 * eDNE file names for the record kinds distributed as a single file.
 */
export const EDNE_FILE_NAMES = {
    locality: "LOG_LOCALIDADE.TXT",
    neighborhood: "LOG_BAIRRO.TXT",
    "big-user": "LOG_GRANDE_USUARIO.TXT",
    "operational-unit": "LOG_UNID_OPER.TXT",
    cpc: "LOG_CPC.TXT",
} as const;

/**
 * Street file of one state.
 *
 * @param uf - State the file covers.
 * @returns The file name, e.g. `LOG_LOGRADOURO_SP.TXT`.
 */
export const addressFileName = (uf: Uf): string => `LOG_LOGRADOURO_${uf}.TXT`;

/**
 * One eDNE source file expected in a data directory.
 */
export interface EdneSourceFile {
    type: RecordTypeName;
    filePath: string;
    /** State covered, for per-state street files */
    uf?: Uf;
}

/**
 * Lists the eDNE files a data directory may hold, in loading order.
 *
 * @param dataDir - Root of the unpacked distribution.
 * @returns Expected file locations, whether they exist or not.
 */
export const edneSourceFiles = (dataDir: string): EdneSourceFile[] => {
    const logDir = path.join(dataDir, LOG_SUBDIR);
    const single = (
        type: keyof typeof EDNE_FILE_NAMES,
    ): EdneSourceFile => ({
        type,
        filePath: path.join(logDir, EDNE_FILE_NAMES[type]),
    });

    return [
        single("locality"),
        single("neighborhood"),
        ...UFS.map(
            (uf): EdneSourceFile => ({
                type: "address",
                filePath: path.join(logDir, addressFileName(uf)),
                uf,
            }),
        ),
        single("big-user"),
        single("operational-unit"),
        single("cpc"),
    ];
};

/**
 * Checks if the given file exists.
 *
 * @param filePath - The path to the file to check.
 * @returns True if the file exists, false otherwise.
 */
export const fileExists = async (filePath: string): Promise<boolean> => {
    try {
        await fsp.access(filePath, fs.constants.F_OK);
        return true;
    } catch (err) {
        if (VERBOSE) error(err);
        return false;
    }
};

/**
 * Reads a source file as raw bytes.
 *
 * @param filePath - The path to the file.
 * @returns The file contents.
 */
export const readSourceFile = async (filePath: string): Promise<Buffer> => {
    if (VERBOSE) logger(`reading ${filePath}`);
    return fsp.readFile(filePath);
};
