/**
 * Polls - Request Schemas
 *
 * @module content/polls/validation
 */

import { z } from 'zod';
import { idSchema, nameSchema, nonEmptyPatch } from '@social-api/shared';

const MIN_OPTIONS = 2;
const QUESTION_MAX = 500;

export const optionSchema = z.object({
    label: nameSchema,
});

export const questionSchema = z
    .object({
        question: z.string().trim().min(1).max(QUESTION_MAX),
        options: z.array(optionSchema).min(MIN_OPTIONS),
    })
    .superRefine((value, ctx) => {
        // Labels are unique per question regardless of case
        const seen = new Set<string>();
        value.options.forEach((option, index) => {
            const key = option.label.toLowerCase();
            if (seen.has(key)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['options', index, 'label'],
                    message: `Option "${option.label}" is repeated`,
                });
            }
            seen.add(key);
        });
    });

export const createPollSchema = z.object({
    title: nameSchema,
    questions: z.array(questionSchema).min(1),
});

export const updatePollSchema = nonEmptyPatch({
    title: nameSchema.optional(),
    isActive: z.boolean().optional(),
});

export const votesSchema = z
    .array(
        z.object({
            questionId: idSchema,
            optionId: idSchema,
        })
    )
    .min(1);

export type QuestionInput = z.infer<typeof questionSchema>;

export function toNewQuestion(input: QuestionInput): { question: string; options: string[] } {
    return { question: input.question, options: input.options.map((option) => option.label) };
}
