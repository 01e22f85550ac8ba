import { z } from "zod";

/**
 * One configured connection. Provider-specific fields pass through
 * untouched and are validated by the provider's own schema.
 */
export const ConnectionConfigSchema = z
	.object({
		enabled: z.boolean().default(true),
	})
	.passthrough();
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;

export const ServiceConfigSchema = z.object({
	connections: z.record(ConnectionConfigSchema).default({}),
});
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const HarnessConfigSchema = z.object({
	logLevel: LogLevelSchema.optional(),
	services: z.record(ServiceConfigSchema).default({}),
});
export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
