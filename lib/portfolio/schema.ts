import { z } from "zod";

export const AssetAllocationSchema = z.object({
  symbol: z.string(),
  name: z.string(),
  allocation: z.number().finite(),
  justification: z.string(),
});

export const PortfolioResponseSchema = z.object({
  portfolio: z.array(AssetAllocationSchema),
  overallJustification: z
    .string()
    .refine((value) => value.trim().length > 0, "Must not be blank"),
});

export type AssetAllocation = z.infer<typeof AssetAllocationSchema>;
export type PortfolioResponse = z.infer<typeof PortfolioResponseSchema>;

export type NormalizedPortfolio = {
  response: PortfolioResponse;
  /** True when allocations were rescaled to sum to 100. */
  normalized: boolean;
  /** Sum of the allocations as the model returned them. */
  originalTotal: number;
};
