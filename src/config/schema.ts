import { z } from "zod";

export const ConfigSchema = z.object({
	pipelinesDir: z.string().default(".pipewright/pipelines"),
	runsDir: z.string().default(".pipewright/runs"),
	maxParallel: z.number().int().positive().optional(),
	defaults: z
		.object({
			timeoutMinutes: z.number().positive().default(60),
			lockTimeoutMinutes: z.number().positive().default(30),
		})
		.default({
			timeoutMinutes: 60,
			lockTimeoutMinutes: 30,
		}),
	locks: z
		.object({
			backend: z.enum(["file", "memory"]).default("file"),
			dir: z.string().default(".pipewright/locks"),
			pollIntervalMs: z.number().int().positive().default(250),
		})
		.default({
			backend: "file",
			dir: ".pipewright/locks",
			pollIntervalMs: 250,
		}),
	params: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
	secrets: z.array(z.string()).default([]),
});

export type PipewrightConfig = z.infer<typeof ConfigSchema>;
