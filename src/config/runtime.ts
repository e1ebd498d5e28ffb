import { hasFlag } from '../util/env.js';
import { VERBOSE } from '../util/verbose.js';

export type Runtime = {
    production: boolean;
    verbose: boolean;
    pretty: boolean;
    save: boolean;
};

export function resolveRuntime(): Runtime {
    const production = process.env.BJ_PRODUCTION === "true";
    const verbose = (VERBOSE || hasFlag("--verbose")) && !production;
    const pretty = !production && !hasFlag("--no-color");
    const save = !hasFlag("--no-save") && process.env.BJ_SAVE !== "false";

    return {
        production,
        verbose,
        pretty,
        save,
    };
}
