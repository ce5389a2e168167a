import { z } from "zod";

export const ParamValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const InputYamlSchema = z
	.object({
		description: z.string().optional(),
		required: z.boolean().default(false),
		default: ParamValueSchema.optional(),
	})
	.strict();

export const LockYamlSchema = z.union([
	z.string().min(1),
	z
		.object({
			name: z.string().min(1),
			"timeout-minutes": z.number().positive().optional(),
		})
		.strict(),
]);

export const StageYamlSchema = z
	.object({
		name: z.string().optional(),
		needs: z.union([z.string(), z.array(z.string())]).optional(),
		if: z.union([z.string(), z.boolean()]).optional(),
		run: z.string().optional(),
		action: z.string().optional(),
		uses: z.string().optional(),
		with: z.record(ParamValueSchema).default({}),
		lock: LockYamlSchema.optional(),
		"timeout-minutes": z.number().positive().optional(),
	})
	.strict();

export const PipelineYamlSchema = z
	.object({
		name: z.string().optional(),
		inputs: z.record(InputYamlSchema.nullable()).default({}),
		stages: z.record(StageYamlSchema),
	})
	.strict();

export type StageYaml = z.infer<typeof StageYamlSchema>;
export type PipelineYaml = z.infer<typeof PipelineYamlSchema>;
