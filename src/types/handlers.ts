import { z } from 'zod';

const verbositySchema = z.enum(['minimal', 'standard', 'detailed']);

const queryFields = {
    subject: z.string().min(1).optional(),
    ability: z.string().min(1).optional(),
    include_trace: z.boolean().optional(),
    verbosity: verbositySchema.optional(),
};

export const EvaluateHandlerArgsSchema = z.object({
    statements: z.array(z.string()),
    ...queryFields,
});

export const EvaluateTextHandlerArgsSchema = z.object({
    input: z.string(),
    ...queryFields,
});

export const CheckWellFormedHandlerArgsSchema = z.object({
    statements: z.array(z.string()),
});

export type EvaluateHandlerArgs = z.infer<typeof EvaluateHandlerArgsSchema>;
