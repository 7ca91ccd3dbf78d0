import { exitCodeFor } from "@dartsmith/core";
import { RegenerationCoordinator } from "@dartsmith/generator";
import { type CliOptions, type LoadedConfig, loadConfig } from "../dev/config-loader";
import { createRunLogger, header, logReport, setLogLevel, startTimer, step, stepFail } from "../dev/logger";
import { validateLogLevel } from "../validate";

/** One batch run. Resolves to the process exit code. */
export async function generate(options: CliOptions): Promise<number> {
    setLogLevel(validateLogLevel(options.logLevel));
    const timer = startTimer();

    let loaded: LoadedConfig;
    try {
        loaded = await loadConfig(options);
    } catch (err) {
        stepFail("config", err instanceof Error ? err.message : String(err));
        return 1;
    }
    header("generate", loaded.root);

    const coordinator = new RegenerationCoordinator({ config: loaded.config, logger: createRunLogger() });
    const report = await coordinator.runAll();
    logReport(report, loaded.root);

    const code = exitCodeFor(report);
    if (code === 0) {
        step("generate", timer(), `${report.filesWritten} written, ${report.filesUnchanged} unchanged`);
    } else {
        stepFail("generate", `${report.errors.length} error(s)`);
    }
    return code;
}
