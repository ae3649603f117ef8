// Valuation disclosure reports: one row per external valuation opinion
// Every field is optional: columns vary across report vintages

/** Storage shape, before numeric and date normalization */
export interface RawReportRecord {
  report_title?: string | null;
  issue_date?: string | null;
  issuer_name?: string | null;
  issuer_sector?: string | null;
  target_name?: string | null;
  target_sector?: string | null;
  target_business?: string | null;
  similar_companies?: string | null;
  valuator?: string | null;
  report_purpose?: string | null;
  wacc?: string | number | null;
  ke?: string | number | null;
  kd?: string | number | null;
  growth_rate?: string | number | null;
  debt_to_equity?: string | number | null;
  ev_sales?: string | number | null;
  ev_ebitda?: string | number | null;
  psr?: string | number | null;
  per?: string | number | null;
  pbr?: string | number | null;
  pv_fraction?: string | number | null;
  non_operating_assets?: string | number | null;
  enterprise_value?: string | number | null;
  noa_composition?: string | null;
  link?: string | null;
}

export interface ValuationReport {
  reportTitle?: string | null;
  issueDate?: string | null;          // YYYY-MM-DD
  issuerName?: string | null;
  issuerSector?: string | null;
  targetName?: string | null;
  targetSector?: string | null;
  targetBusiness?: string | null;
  similarCompanies?: string | null;
  valuator?: string | null;
  reportPurpose?: string | null;
  wacc?: number | null;
  ke?: number | null;
  kd?: number | null;
  growthRate?: number | null;         // perpetual growth g
  debtToEquity?: number | null;
  evSales?: number | null;
  evEbitda?: number | null;
  psr?: number | null;
  per?: number | null;
  pbr?: number | null;
  pvFraction?: number | null;         // PV share of the explicit forecast period
  nonOperatingAssets?: number | null;
  enterpriseValue?: number | null;
  noaComposition?: string | null;     // comma-delimited free text
  link?: string | null;
}

export type ReportField = keyof ValuationReport;

export type NumericReportField =
  | 'wacc' | 'ke' | 'kd' | 'growthRate' | 'debtToEquity'
  | 'evSales' | 'evEbitda' | 'psr' | 'per' | 'pbr'
  | 'pvFraction' | 'nonOperatingAssets' | 'enterpriseValue';

export interface DateRange {
  startDate?: string | null;          // inclusive, YYYY-MM-DD
  endDate?: string | null;            // inclusive, YYYY-MM-DD
}
