export interface TimingResult {
    label: string;
    durationMs: number;
}

export type LogStream = "stdout" | "stderr";

class Logger {
    private static instance: Logger;
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;
    private traceEnabled: boolean = false;
    private infoStream: LogStream = "stdout";

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    /**
     * Route info lines to stderr (the MCP server keeps stdout for the protocol)
     */
    public setInfoStream(stream: LogStream): void {
        this.infoStream = stream;
    }

    public log(message: string) {
        const line = `[${new Date().toISOString()}] [INFO] ${message}`;
        if (this.infoStream === "stdout") {
            console.log(line);
        } else {
            console.error(line);
        }
    }

    public warn(message: string) {
        console.error(`[${new Date().toISOString()}] [WARN] ${message}`);
    }

    public error(message: string) {
        console.error(`[${new Date().toISOString()}] [ERROR] ${message}`);
    }

    /**
     * Verbose diagnostics, printed only when tracing is on (--trace)
     */
    public debug(message: string): void {
        if (this.traceEnabled) {
            console.error(`[${new Date().toISOString()}] [DEBUG] ${message}`);
        }
    }

    public setTraceEnabled(enabled: boolean): void {
        this.traceEnabled = enabled;
    }

    /**
     * Enable or disable timing collection
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) {
            this.timings = [];
        }
    }

    /**
     * Time an async function and record the result
     */
    public async timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = await fn();
        const durationMs = performance.now() - start;
        this.timings.push({ label, durationMs });
        return result;
    }

    /**
     * Get all recorded timings
     */
    public getTimings(): TimingResult[] {
        return [...this.timings];
    }

    /**
     * Print timing summary to stderr
     */
    public printTimings(): void {
        if (!this.timingEnabled) return;
        if (this.timings.length === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        console.error("\n[TIMING] === Performance Summary ===");
        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);

        for (const timing of this.timings) {
            const pct = total > 0 ? ((timing.durationMs / total) * 100).toFixed(1) : "0.0";
            console.error(`[TIMING] ${timing.label.padEnd(30)} ${timing.durationMs.toFixed(2).padStart(8)}ms (${pct.padStart(5)}%)`);
        }

        console.error(`[TIMING] ${"TOTAL".padEnd(30)} ${total.toFixed(2).padStart(8)}ms`);
        console.error("[TIMING] ================================\n");
    }
}

export default Logger;
