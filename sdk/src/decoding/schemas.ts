/**
 * Wire schemas for the responses the SDK reads.
 *
 * Only the fields the SDK uses are declared; everything else passes through.
 */

import { z } from 'zod';

export const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().optional(),
    expires_at: z.string().datetime({ offset: true }).optional(),
    token_type: z.string().default('bearer'),
    refresh_token: z.string().min(1),
    refresh_expires: z.number().optional(),
    refresh_expires_at: z.string().datetime({ offset: true }).optional(),
    account_id: z.string().min(1),
    client_id: z.string().optional(),
    displayName: z.string().optional(),
    app: z.string().optional(),
    in_app_id: z.string().optional(),
    device_id: z.string().optional(),
  })
  .passthrough()
  .refine((token) => token.expires_at !== undefined || token.expires_in !== undefined, {
    message: 'expires_at or expires_in is required',
  })
  .refine((token) => token.refresh_expires_at !== undefined || token.refresh_expires !== undefined, {
    message: 'refresh_expires_at or refresh_expires is required',
  });

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export const externalAuthSchema = z
  .object({
    type: z.string(),
    externalDisplayName: z.string().optional(),
    accountId: z.string().optional(),
  })
  .passthrough();

export const accountSchema = z
  .object({
    id: z.string().min(1),
    displayName: z.string().optional(),
    externalAuths: z.record(externalAuthSchema).default({}),
  })
  .passthrough();

export type AccountPayload = z.infer<typeof accountSchema>;

export const eulaAgreementSchema = z
  .object({
    key: z.string(),
    version: z.number(),
    locale: z.string().optional(),
  })
  .passthrough();

export type EulaAgreement = z.infer<typeof eulaAgreementSchema>;
