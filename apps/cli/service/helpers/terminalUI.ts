/**
 * Terminal UI Helper Module
 *
 * Styled terminal output for the eDNE CLI: ora spinners, chalk colors,
 * sections and key-value tables.
 */

import chalk from "chalk";
import ora from "ora";
import type { Uf } from "@repo/edne-core";

// ---------------------------------------------------------------------------------
// Theme Configuration
// ---------------------------------------------------------------------------------

/**
 * Color palette shared by every command.
 */
export const theme = {
    /** Headings and the banner */
    primary: chalk.hex("#009C3B"),
    /** Highlights and sub-headings */
    secondary: chalk.hex("#FFDF00"),
    success: chalk.hex("#10B981"),
    warning: chalk.hex("#F59E0B"),
    error: chalk.hex("#EF4444"),
    /** Labels and supplementary text */
    muted: chalk.hex("#6B7280"),
    info: chalk.hex("#3B82F6"),
    /** Values in key-value tables */
    highlight: chalk.hex("#002776"),
    dim: chalk.dim,
    bold: chalk.bold,
} as const;

// ---------------------------------------------------------------------------------
// Branding
// ---------------------------------------------------------------------------------

const LOGO = `
${theme.primary("        ____  _   ________")}
${theme.primary("  ___  / __ \\/ | / / ____/")}
${theme.secondary(" / _ \\/ / / /  |/ / __/   ")}
${theme.secondary("/  __/ /_/ / /|  / /___   ")}
${theme.primary("\\___/_____/_/ |_/_____/   ")}
`;

/**
 * Displays the logo and version information.
 *
 * @param version - The current version string to display.
 */
export function displayBanner(version?: string): void {
    if (isQuietMode) return;
    console.log(LOGO);
    console.log(
        theme.muted("  ─────────────────────────────────────────────────────"),
    );
    console.log(`  ${theme.bold("Brazilian postal directory (eDNE) toolkit")}`);
    if (version) {
        console.log(`  ${theme.muted(`Version ${version}`)}`);
    }
    console.log(
        theme.muted(
            "  ─────────────────────────────────────────────────────\n",
        ),
    );
}

// ---------------------------------------------------------------------------------
// Spinner Management
// ---------------------------------------------------------------------------------

/** Current active spinner instance for sequential operations */
let currentSpinner: ora.Ora | null = null;

/** When set, spinners and decorative output are suppressed */
let isQuietMode = false;

/**
 * Enables or disables quiet mode.
 *
 * @param enabled - Whether quiet mode should be enabled.
 */
export function setQuietMode(enabled: boolean): void {
    isQuietMode = enabled;
}

const spinnerFrames = ["◐", "◓", "◑", "◒"];

/**
 * Creates and starts a new spinner with the given message. In quiet mode
 * the spinner is silent.
 *
 * @param text - The message to display alongside the spinner.
 * @returns The ora spinner instance.
 */
export function startSpinner(text: string): ora.Ora {
    if (currentSpinner?.isSpinning) {
        currentSpinner.stop();
    }

    currentSpinner = ora({
        text: theme.info(text),
        spinner: {
            interval: 80,
            frames: spinnerFrames,
        },
        color: "green",
        isSilent: isQuietMode,
    }).start();

    return currentSpinner;
}

/**
 * Updates the current spinner's text.
 */
export function updateSpinner(text: string): void {
    if (!currentSpinner) return;
    currentSpinner.text = theme.info(text);
}

/**
 * Marks the current spinner as successful.
 *
 * @param text - Optional success message. Uses spinner text if not provided.
 */
export function succeedSpinner(text?: string): void {
    if (!currentSpinner) return;
    currentSpinner.succeed(theme.success(text || currentSpinner.text));
    currentSpinner = null;
}

/**
 * Marks the current spinner as failed.
 *
 * @param text - Optional error message. Uses spinner text if not provided.
 */
export function failSpinner(text?: string): void {
    if (!currentSpinner) return;
    currentSpinner.fail(theme.error(text || currentSpinner.text));
    currentSpinner = null;
}

// ---------------------------------------------------------------------------------
// Logging Functions
// ---------------------------------------------------------------------------------

export function logSuccess(message: string): void {
    if (isQuietMode) return;
    console.log(`${theme.success("✔")} ${message}`);
}

/**
 * Logs an error message with an X icon. Errors are printed in quiet mode
 * too.
 */
export function logError(message: string): void {
    console.error(`${theme.error("✖")} ${theme.error(message)}`);
}

export function logWarning(message: string): void {
    if (isQuietMode) return;
    console.log(`${theme.warning("⚠")} ${theme.warning(message)}`);
}

// ---------------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------------

/**
 * Formats a number with Brazilian thousands separators.
 *
 * @param num - The number to format.
 * @returns Formatted number, e.g. "1.234.567".
 */
export function formatNumber(num: number): string {
    return num.toLocaleString("pt-BR");
}

/**
 * Formats bytes into a human-readable size string.
 *
 * @param bytes - The number of bytes to format.
 * @returns Human-readable size string (e.g., "1.50 MB").
 */
export function formatBytes(bytes: number): string {
    const units = ["B", "KB", "MB", "GB", "TB"];
    let unitIndex = 0;
    let size = bytes;

    while (size >= 1024 && unitIndex < units.length - 1) {
        size /= 1024;
        unitIndex++;
    }

    return `${size.toFixed(2)} ${units[unitIndex]}`;
}

/**
 * Formats a duration in milliseconds to a human-readable string.
 *
 * @param ms - Duration in milliseconds.
 * @returns Human-readable duration (e.g., "1m 5s", "320ms").
 */
export function formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);

    if (minutes > 0) {
        return `${minutes}m ${seconds % 60}s`;
    }
    if (seconds > 0) {
        return `${seconds}s`;
    }
    return `${Math.round(ms)}ms`;
}

/**
 * Lays out key-value pairs as aligned rows.
 *
 * @param data - Pairs to lay out, in insertion order.
 * @param indent - Number of spaces to indent each row.
 * @returns One row per pair, keys padded to the longest key.
 */
export function formatKeyValue(
    data: Record<string, string | number>,
    indent = 2,
): string[] {
    const padding = " ".repeat(indent);
    const keys = Object.keys(data);
    const maxKeyLength = Math.max(0, ...keys.map((k) => k.length));

    return Object.entries(data).map(
        ([key, value]) => `${padding}${key.padEnd(maxKeyLength)}  ${value}`,
    );
}

// ---------------------------------------------------------------------------------
// Section Headers
// ---------------------------------------------------------------------------------

/**
 * Displays a styled section header.
 *
 * @param title - The section title to display.
 */
export function displaySection(title: string): void {
    if (isQuietMode) return;
    console.log();
    console.log(`${theme.primary("▸")} ${theme.bold(title)}`);
    console.log(theme.muted(`  ${"─".repeat(title.length + 2)}`));
}

/**
 * Displays a styled subsection header.
 */
export function displaySubsection(title: string): void {
    if (isQuietMode) return;
    console.log(`  ${theme.secondary("›")} ${title}`);
}

/**
 * Displays key-value pairs with muted keys and highlighted values.
 */
export function displayKeyValue(
    data: Record<string, string | number>,
    indent = 2,
): void {
    if (isQuietMode) return;

    const padding = " ".repeat(indent);
    const maxKeyLength = Math.max(0, ...Object.keys(data).map((k) => k.length));

    for (const [key, value] of Object.entries(data)) {
        const paddedKey = key.padEnd(maxKeyLength);
        console.log(
            `${padding}${theme.muted(paddedKey)}  ${theme.highlight(String(value))}`,
        );
    }
}

// ---------------------------------------------------------------------------------
// State-Specific Styling
// ---------------------------------------------------------------------------------

const regionColors = {
    north: chalk.hex("#15803D"),
    northeast: chalk.hex("#EA580C"),
    centralWest: chalk.hex("#CA8A04"),
    southeast: chalk.hex("#2563EB"),
    south: chalk.hex("#7C3AED"),
};

/**
 * Geographic region of each UF, used to color state codes.
 */
const stateRegions: Record<Uf, keyof typeof regionColors> = {
    AC: "north",
    AP: "north",
    AM: "north",
    PA: "north",
    RO: "north",
    RR: "north",
    TO: "north",
    AL: "northeast",
    BA: "northeast",
    CE: "northeast",
    MA: "northeast",
    PB: "northeast",
    PE: "northeast",
    PI: "northeast",
    RN: "northeast",
    SE: "northeast",
    DF: "centralWest",
    GO: "centralWest",
    MT: "centralWest",
    MS: "centralWest",
    ES: "southeast",
    MG: "southeast",
    RJ: "southeast",
    SP: "southeast",
    PR: "south",
    RS: "south",
    SC: "south",
};

/**
 * Formats a state code in its region's color.
 *
 * @param uf - State code.
 * @returns Colored, bold state code.
 */
export function formatState(uf: Uf): string {
    return regionColors[stateRegions[uf]].bold(uf);
}
