import { z } from "zod";

export const bitSchema = z.union([z.literal(0), z.literal(1)]);

export const stateNameSchema = z.string().min(1);

export const transitionRowSchema = z
  .object({
    "0": stateNameSchema.optional(),
    "1": stateNameSchema.optional(),
  })
  .strict();

export const machineDefinitionSchema = z.object({
  version: z.literal("1.0").default("1.0"),
  name: z.string().min(1).default("anonymous"),
  states: z.array(stateNameSchema).min(1),
  initial: stateNameSchema,
  transitions: z.record(stateNameSchema, transitionRowSchema),
  outputs: z.record(stateNameSchema, bitSchema),
});

export const runRecordSchema = z.object({
  version: z.literal("1.0"),
  runId: z.string().min(1),
  machine: z.string().min(1),
  startedAt: z.string().min(1),
  inputs: z.array(bitSchema),
  outputs: z.array(bitSchema),
  finalState: stateNameSchema,
});

export type Bit = z.infer<typeof bitSchema>;
export type TransitionRow = z.infer<typeof transitionRowSchema>;
export type MachineDefinition = z.infer<typeof machineDefinitionSchema>;
export type MachineDefinitionInput = z.input<typeof machineDefinitionSchema>;
export type RunRecord = z.infer<typeof runRecordSchema>;
