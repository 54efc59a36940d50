import pino from "pino";

/**
 * The subset of pino's API the store logs through. Any pino logger fits.
 */
export type StoreLogger = {
	debug: (obj: Record<string, unknown>, msg?: string) => void;
	info: (obj: Record<string, unknown>, msg?: string) => void;
	warn: (obj: Record<string, unknown>, msg?: string) => void;
	error: (obj: Record<string, unknown>, msg?: string) => void;
};

export const createDefaultLogger = (): StoreLogger =>
	pino({
		name: "record-store",
		level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
	});
