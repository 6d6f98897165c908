/**
 * Category logger for the streaming path.
 * info/warn/error always print; debug output needs BSA_DEBUG=1 and is sampled
 * so the per-pulse delivery path never floods the console.
 */
export class StreamLogger {
    private static enabled = process.env.BSA_DEBUG === '1';
    private static readonly sampleEvery = 100;
    private static sampleCounter = 0;

    /**
     * Sampled debug line, for per-update diagnostics
     */
    static debug(category: string, message: string): void {
        if (!this.enabled) return;

        this.sampleCounter++;
        if (this.sampleCounter % this.sampleEvery !== 0) return;

        console.debug(`🔍 [${category}] ${message}`);
    }

    static info(category: string, message: string): void {
        console.log(`📡 [${category}] ${message}`);
    }

    static warn(category: string, message: string, data?: unknown): void {
        if (data === undefined) {
            console.warn(`⚠️ [${category}] ${message}`);
        } else {
            console.warn(`⚠️ [${category}] ${message}`, data);
        }
    }

    static error(category: string, message: string, error?: unknown): void {
        if (error === undefined) {
            console.error(`❌ [${category}] ${message}`);
        } else {
            console.error(`❌ [${category}] ${message}`, error);
        }
    }

    static setDebugEnabled(enabled: boolean): void {
        this.enabled = enabled;
        this.sampleCounter = 0;
    }

    static isDebugEnabled(): boolean {
        return this.enabled;
    }
}
