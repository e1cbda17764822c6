import { z } from 'zod';
import { ClassificationFailure } from '../../errors';

export const INTENT_KINDS = ['build', 'fix', 'improve', 'answer', 'none'] as const;

export type IntentKind = (typeof INTENT_KINDS)[number];

const text = z.string().trim().min(1);

export const BuildIntentSchema = z.object({
    kind: z.literal('build'),
    requirements: text.describe('One-sentence summary of what the extension must do'),
    features: z.array(text).describe('Individual features requested, may be empty'),
    targetSites: z
        .array(text)
        .describe('URL patterns or site names the extension should run on, may be empty'),
});

export const FixIntentSchema = z.object({
    kind: z.literal('fix'),
    symptom: text.describe('The misbehaviour the user describes'),
    errorText: z
        .string()
        .nullable()
        .describe('Verbatim error message quoted by the user, or null'),
});

export const ImproveIntentSchema = z.object({
    kind: z.literal('improve'),
    enhancement: text.describe('The change or addition the user asks for'),
});

export const AnswerIntentSchema = z.object({
    kind: z.literal('answer'),
    question: text.describe('The question to answer'),
});

export const NoneIntentSchema = z.object({
    kind: z.literal('none'),
});

export const IntentSchema = z.discriminatedUnion('kind', [
    BuildIntentSchema,
    FixIntentSchema,
    ImproveIntentSchema,
    AnswerIntentSchema,
    NoneIntentSchema,
]);

/** Structured-output envelope; providers expect an object at the root. */
export const ClassificationSchema = z.object({
    intent: IntentSchema,
});

export type Intent = z.infer<typeof IntentSchema>;
export type BuildIntent = z.infer<typeof BuildIntentSchema>;
export type FixIntent = z.infer<typeof FixIntentSchema>;
export type ImproveIntent = z.infer<typeof ImproveIntentSchema>;
export type GenerationIntent = BuildIntent | FixIntent | ImproveIntent;

export function parseIntent(value: unknown): Intent {
    const parsed = IntentSchema.safeParse(value);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'intent'}: ${issue.message}`)
            .join('; ');
        throw new ClassificationFailure(`Malformed intent (${issues})`);
    }
    return parsed.data;
}

export function isGenerationIntent(intent: Intent): intent is GenerationIntent {
    return intent.kind === 'build' || intent.kind === 'fix' || intent.kind === 'improve';
}
