// src/extraction/builtin.ts
// Stock mappings for the common subject shapes: a profile record, a user
// that embeds a profile, and a loan applicant with derived ratios.

import { toNumber, type FieldType } from "../engine/operators";
import { BaseMapping } from "./mappings";
import { MappingRegistry } from "./registry";
import type { ComputedField, RelationKind } from "./types";

export class ProfileMapping extends BaseMapping {
  readonly name = "Profile";
  readonly sourceType = "profile";
  readonly description = "Personal profile details";
  readonly prefix = "profile";

  protected fieldMappings = {
    date_of_birth: "birth_date",
    annual_income: "income",
    employment_status: "employment",
    country_code: "country",
  };

  protected fieldTypes: Record<string, FieldType> = {
    birth_date: "date",
    income: "numeric",
    employment: "string",
    country: "string",
  };
}

export class UserMapping extends BaseMapping {
  readonly name = "User";
  readonly sourceType = "user";
  readonly description = "Account holder with an embedded profile";

  protected fieldMappings = {
    email_verified_at: "verified_at",
  };

  protected relations: Record<string, RelationKind> = {
    profile: "one",
    orders: "many",
  };

  protected fieldDescriptions = {
    orders_count: "Number of orders placed",
  };

  constructor() {
    super();
    this.includeMapping("profile", new ProfileMapping());
  }
}

export class LoanApplicantMapping extends BaseMapping {
  readonly name = "Loan Applicant";
  readonly sourceType = "loan_applicant";
  readonly description = "Applicant with existing loans and monthly obligations";

  protected fieldMappings = {
    monthly_income: "income",
    bureau_score: "credit_score",
  };

  protected relations: Record<string, RelationKind> = {
    loans: "many",
  };

  protected fieldTypes: Record<string, FieldType> = {
    income: "numeric",
    credit_score: "integer",
    debt_to_income: "numeric",
  };

  protected computedFields: Record<string, ComputedField> = {
    debt_to_income: (_source, data) => {
      const income = toNumber(data.income);
      const debt = toNumber(data.monthly_debt) ?? 0;
      if (income === null || income === 0) return null;
      return Math.round((debt / income) * 10000) / 100;
    },
  };
}

/** Registry preloaded with the stock mappings */
export function createDefaultRegistry(): MappingRegistry {
  return new MappingRegistry()
    .register(new ProfileMapping())
    .register(new UserMapping())
    .register(new LoanApplicantMapping());
}
