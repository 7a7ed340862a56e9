/**
 * Centralized configuration for the eDNE CLI.
 *
 * Environment variables are parsed once, when this module is first loaded.
 * The CLI loads `.env` through dotenv before any command imports it.
 *
 * @module config
 */

// ---------------------------------------------------------------------------------
// Data Directory
// ---------------------------------------------------------------------------------

/**
 * Directory holding the unpacked eDNE distribution, used when a command is
 * given no directory argument.
 *
 * @default "data"
 * @env EDNE_DATA_DIR
 */
export const DATA_DIR = process.env.EDNE_DATA_DIR ?? "data";

/**
 * Subdirectory of the data directory that holds the `LOG_*.TXT` files.
 *
 * @default "log"
 * @env EDNE_LOG_SUBDIR
 */
export const LOG_SUBDIR = process.env.EDNE_LOG_SUBDIR ?? "log";

// ---------------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------------

/**
 * Records listed per state by the `parse` command.
 *
 * @default 10
 * @env EDNE_REPORT_SAMPLE_SIZE
 */
export const REPORT_SAMPLE_SIZE =
    Number.parseInt(process.env.EDNE_REPORT_SAMPLE_SIZE ?? "10", 10) || 10;

// ---------------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------------

/**
 * Enables chatty debug logging (file-by-file progress in the `edne:cli`
 * namespace).
 *
 * @default false
 * @env VERBOSE
 */
export const VERBOSE =
    process.env.VERBOSE === "true" || process.env.VERBOSE === "1";
