import { version } from "@repo/edne-core";
import { DATA_DIR, LOG_SUBDIR } from "./config";
import { theme } from "./helpers/terminalUI";

/**
 * Prints version, runtime and configuration metadata to stdout.
 */
export function printVersion(): void {
    console.log(`${theme.muted("Version:")}      ${version}`);
    console.log(`${theme.muted("Node.js:")}      ${process.version}`);
    console.log(`${theme.muted("Platform:")}     ${process.platform}`);
    console.log(`${theme.muted("Architecture:")} ${process.arch}`);
    console.log(`${theme.muted("Data dir:")}     ${DATA_DIR}/${LOG_SUBDIR}`);
    console.log(
        `${theme.muted("Environment:")}  ${process.env.NODE_ENV || "development"}`,
    );
}
