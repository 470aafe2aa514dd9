/**
 * Tagged console logger
 *
 * Output format: `<emoji> [Tag] message`, e.g. `⚠️ [JoinEngine] ...`
 */

export type Logger = {
	info: (message: string, ...details: unknown[]) => void;
	success: (message: string, ...details: unknown[]) => void;
	warn: (message: string, ...details: unknown[]) => void;
	error: (message: string, ...details: unknown[]) => void;
};

export const createLogger = (tag: string): Logger => ({
	info: (message, ...details) => console.log(`🔍 [${tag}] ${message}`, ...details),
	success: (message, ...details) =>
		console.log(`✅ [${tag}] ${message}`, ...details),
	warn: (message, ...details) => console.warn(`⚠️ [${tag}] ${message}`, ...details),
	error: (message, ...details) =>
		console.error(`❌ [${tag}] ${message}`, ...details),
});
