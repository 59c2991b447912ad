import { z } from "zod";
import { LANGUAGES } from "../types/story.js";
import { ValidationError } from "../utils/errorHandler.js";

const id = z.string().trim().min(1).max(100);
const language = z.enum(LANGUAGES);

export const ChapterSynthesisSchema = z.object({
    personId: id.optional(),
    chapterId: id,
    styleGuide: z.string().max(5000).optional(),
    contextSummary: z.string().max(20000).optional(),
    regenerate: z.boolean().default(false)
});

export const BookCompileSchema = z.object({
    personId: id.optional(),
    styleGuide: z.string().max(5000).optional()
});

export const AnswerSchema = z.object({
    chapterId: id,
    questionId: id,
    text: z.string().max(20000),
    audioUrl: z.string().url().optional()
});

export const AnswersQuerySchema = z.object({
    chapterId: id
});

export const LanguageQuerySchema = z.object({
    language: language.optional()
});

export const LanguagePreferenceSchema = z.object({
    language
});

export const LlmPermissionSchema = z.object({
    personId: id,
    canUseLlm: z.boolean()
});

export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new ValidationError('Invalid request', { issues: result.error.flatten().fieldErrors });
    }
    return result.data;
}
