export const SECURITY_TYPE_COMMON_STOCK = "COMMON_STOCK";

/**
 * Provider-side company metadata before it is split into company and security rows.
 */
export type CompanyProfile = {
  symbol: string;
  name?: string;
  exchange?: string;
  sector?: string;
  industry?: string;
  country?: string;
  website?: string;
  description?: string;
  currency?: string;
};

export type Company = {
  ticker: string;
  companyName: string;
  exchange?: string;
  sector?: string;
  industry?: string;
  country?: string;
  website?: string;
  description?: string;
};

export type Security = {
  companyId: string;
  symbol: string;
  securityType: typeof SECURITY_TYPE_COMMON_STOCK;
  currency?: string;
};
