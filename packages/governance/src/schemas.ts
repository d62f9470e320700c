// Input schemas shared by the engines and the HTTP bridge

import { z } from 'zod';
import { DECIMAL_PATTERN, normalizeDecimal } from './decimal.js';
import { ValidationError } from './errors.js';

/** Maximum number of attachments per temperature check / proposal */
export const MAX_ATTACHMENTS = 10;
/** Maximum number of vote options per ballot */
export const MAX_VOTE_OPTIONS = 10;

const U32_MAX = 4_294_967_295;

export const AddressSchema = z.string().min(1, 'Address cannot be empty');

export const TimestampSchema = z.number().int().nonnegative();

/** A decimal string as written; `DecimalSchema` also normalizes it */
export const DecimalStringSchema = z
  .string()
  .regex(DECIMAL_PATTERN, 'Expected a non-negative decimal with at most 18 fractional digits');

export const DecimalSchema = DecimalStringSchema.transform(normalizeDecimal);

export const VoteOptionIdSchema = z.number().int().min(0).max(U32_MAX);

export const VoteOptionSchema = z.object({
  id: VoteOptionIdSchema,
  label: z.string(),
});

/** Opaque reference to a stored file; never dereferenced here */
export const AttachmentSchema = z.object({
  kvsAddress: z.string(),
  componentAddress: z.string(),
  fileHash: z.string(),
});

export const TemperatureCheckDraftSchema = z
  .object({
    title: z.string().min(1, 'Temperature check title cannot be empty'),
    description: z.string().min(1, 'Temperature check description cannot be empty'),
    voteOptions: z
      .array(VoteOptionSchema)
      .min(1, 'Temperature check must have at least one vote option')
      .max(MAX_VOTE_OPTIONS, `Too many vote options (max ${MAX_VOTE_OPTIONS})`),
    attachments: z
      .array(AttachmentSchema)
      .max(MAX_ATTACHMENTS, `Too many attachments (max ${MAX_ATTACHMENTS})`)
      .default([]),
    rfcUrl: z.string().url(),
    maxSelections: z.number().int().min(1).optional(),
  })
  .superRefine((draft, ctx) => {
    if (draft.maxSelections !== undefined && draft.maxSelections > draft.voteOptions.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxSelections'],
        message: 'maxSelections cannot exceed the number of vote options',
      });
    }
  });

export const TemperatureCheckVoteSchema = z.enum(['For', 'Against']);

const DayCountSchema = z.number().int().min(0).max(65535);

function parametersSchema<D extends z.ZodTypeAny>(decimal: D) {
  return z.object({
    temperatureCheckDays: DayCountSchema,
    temperatureCheckQuorum: decimal,
    temperatureCheckApprovalThreshold: decimal,
    temperatureCheckProposeThreshold: decimal,
    proposalLengthDays: DayCountSchema,
    proposalQuorum: decimal,
    proposalApprovalThreshold: decimal,
  });
}

export const GovernanceParametersSchema = parametersSchema(DecimalSchema);

/** Same checks as `GovernanceParametersSchema`, but decimals keep the form they were sent in */
export const GovernanceParametersInputSchema = parametersSchema(DecimalStringSchema);

export type TemperatureCheckDraftInput = z.input<typeof TemperatureCheckDraftSchema>;
export type TemperatureCheckDraft = z.output<typeof TemperatureCheckDraftSchema>;
export type GovernanceParametersInput = z.input<typeof GovernanceParametersSchema>;

/**
 * Parse `input` with `schema`, converting zod failures into a ValidationError
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(`Invalid ${what}: ${issues.map((i) => i.message).join('; ')}`, issues);
  }
  return result.data;
}
