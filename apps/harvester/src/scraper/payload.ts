/**
 * Decoding of the pricing API response.
 *
 * The API is not ours and changes without notice, so the body is decoded into
 * a tagged result instead of reading fields off raw JSON. A bad body is a
 * data problem, not a transport problem, and the fetcher does not retry it.
 */

import { z } from 'zod'

const planValue = z.union([z.number(), z.string()]).nullish()

const pricingPlanSchema = z.object({
  type: z.string().nullish(),
  monthly: planValue,
  downPayment: planValue,
  giftCard: planValue,
  residualValue: planValue,
})

const pricingPayloadSchema = z.array(pricingPlanSchema)

export type PlanValue = z.infer<typeof planValue>
export type PricingPlan = z.infer<typeof pricingPlanSchema>

export const KEEP_IT = 'keep-it'
export const RETURN_IT = 'return-it'

export type PayloadDecodeFailure = 'INVALID_JSON' | 'UNEXPECTED_SHAPE'

export type PayloadDecodeResult =
  | { ok: true; plans: PricingPlan[] }
  | { ok: false; reason: PayloadDecodeFailure; details: string }

export function decodePricingPayload(body: string): PayloadDecodeResult {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch (error) {
    return {
      ok: false,
      reason: 'INVALID_JSON',
      details: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }

  const parsed = pricingPayloadSchema.safeParse(json)
  if (!parsed.success) {
    return {
      ok: false,
      reason: 'UNEXPECTED_SHAPE',
      details: parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    }
  }

  return { ok: true, plans: parsed.data }
}
