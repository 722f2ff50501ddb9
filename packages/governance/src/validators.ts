/**
 * Validator roster.
 *
 * Loaded once per governance cycle into a map keyed by validator id and
 * never re-read mid-vote. Only active validators carry weight.
 */

import { z } from "zod";
import { GovernanceError } from "@compliance-ledger/types";
import type { Validator, ValidatorRosterDocument } from "@compliance-ledger/types";

export const ValidatorSchema: z.ZodType<Validator> = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    voting_power: z.number().finite().nonnegative(),
    active: z.boolean(),
  })
  .strict();

export const ValidatorRosterSchema: z.ZodType<ValidatorRosterDocument> = z
  .object({
    version: z.string(),
    validators: z.array(ValidatorSchema),
  })
  .strict()
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.validators.forEach((v, i) => {
      if (seen.has(v.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["validators", i, "id"],
          message: `duplicate validator id "${v.id}"`,
        });
      }
      seen.add(v.id);
    });
  });

export class ValidatorRoster {
  private readonly validators: ReadonlyMap<string, Validator>;

  private constructor(validators: ReadonlyMap<string, Validator>) {
    this.validators = validators;
  }

  /**
   * @throws GovernanceError on duplicate ids or negative power
   */
  static from(validators: readonly Validator[]): ValidatorRoster {
    const map = new Map<string, Validator>();
    for (const v of validators) {
      if (map.has(v.id)) {
        throw new GovernanceError(`Duplicate validator id "${v.id}"`, { validator_id: v.id });
      }
      if (!Number.isFinite(v.voting_power) || v.voting_power < 0) {
        throw new GovernanceError(`Validator "${v.id}" has invalid voting power ${v.voting_power}`, {
          validator_id: v.id,
        });
      }
      map.set(v.id, v);
    }
    return new ValidatorRoster(map);
  }

  static fromDocument(doc: ValidatorRosterDocument): ValidatorRoster {
    return ValidatorRoster.from(doc.validators);
  }

  get size(): number {
    return this.validators.size;
  }

  get(id: string): Validator | undefined {
    return this.validators.get(id);
  }

  active(): Validator[] {
    return [...this.validators.values()].filter((v) => v.active);
  }

  /** Weight of a validator's vote; zero when unknown or inactive */
  weightOf(id: string): number {
    const v = this.validators.get(id);
    return v !== undefined && v.active ? v.voting_power : 0;
  }

  totalVotingPower(): number {
    return this.active().reduce((sum, v) => sum + v.voting_power, 0);
  }
}
