import { exitCodeFor } from "@dartsmith/core";
import { RegenerationCoordinator } from "@dartsmith/generator";
import { type CliOptions, type LoadedConfig, loadConfig } from "../dev/config-loader";
import { createRunLogger, error, info, setLogLevel, startTimer, step, stepFail } from "../dev/logger";
import { validateLogLevel } from "../validate";

/** Remove every generated companion below the input paths. */
export async function clean(options: CliOptions): Promise<number> {
    setLogLevel(validateLogLevel(options.logLevel));
    const timer = startTimer();

    let loaded: LoadedConfig;
    try {
        loaded = await loadConfig(options);
    } catch (err) {
        stepFail("config", err instanceof Error ? err.message : String(err));
        return 1;
    }

    const report = await new RegenerationCoordinator({ config: loaded.config, logger: createRunLogger() }).clean();
    for (const diagnostic of report.errors) error(diagnostic.message);
    info(`Removed ${report.filesRemoved} generated file${report.filesRemoved === 1 ? "" : "s"}`);
    step("clean", timer());
    return exitCodeFor(report);
}
