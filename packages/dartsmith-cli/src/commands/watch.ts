import { relative } from "node:path";
import { exitCodeFor } from "@dartsmith/core";
import { RegenerationCoordinator } from "@dartsmith/generator";
import { type CliOptions, type LoadedConfig, loadConfig } from "../dev/config-loader";
import {
    createRunLogger,
    error,
    footer,
    header,
    logDiagnostics,
    logReport,
    note,
    setLogLevel,
    startTimer,
    step,
    stepFail,
} from "../dev/logger";
import { watchChanges } from "../dev/watcher";
import { validateLogLevel } from "../validate";

/**
 * Batch run, then regenerate on every change until SIGINT or SIGTERM. A
 * fatal report (configuration or change stream) ends the session with 1.
 */
export async function watch(options: CliOptions): Promise<number> {
    setLogLevel(validateLogLevel(options.logLevel));
    const timer = startTimer();

    let loaded: LoadedConfig;
    try {
        loaded = await loadConfig(options);
    } catch (err) {
        stepFail("config", err instanceof Error ? err.message : String(err));
        return 1;
    }
    const { root, configPath } = loaded;
    header("watch", root);

    const controller = new AbortController();
    let fatal = false;
    const coordinator = new RegenerationCoordinator({
        config: loaded.config,
        logger: createRunLogger(),
        reloadConfig: async () => (await loadConfig(options)).config,
        onReport: (report) => {
            logDiagnostics(report, root);
            if (report.fatal) {
                fatal = true;
                controller.abort();
            }
        },
    });

    const initial = await coordinator.runAll();
    logReport(initial, root);
    if (initial.fatal) {
        stepFail("generate", "cannot start watching");
        return 1;
    }
    step("generate", timer(), `${initial.filesWritten} written, ${initial.filesUnchanged} unchanged`);

    const stop = () => controller.abort();
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    footer("Watching for changes");
    for (const input of loaded.config.inputPaths) note(relative(root, input) || ".");

    let code = exitCodeFor(initial);
    try {
        await coordinator.consume(watchChanges({ roots: loaded.config.inputPaths, configPath, signal: controller.signal }));
    } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        code = 1;
    } finally {
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);
        await coordinator.dispose();
    }
    return fatal ? 1 : code;
}
