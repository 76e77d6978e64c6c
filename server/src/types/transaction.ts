import type { Failure, SourceStatus } from '../lib/errors';

export type ProductType = 'apt' | 'offi';

export type ProductSelection = ProductType | 'both';

export type YearMonth = {
  year: number;
  month: number;
};

/**
 * 실거래 1건. 값을 읽지 못한 필드는 null 로 남기고 행은 버리지 않는다.
 */
export type TransactionRecord = {
  product: ProductType;
  lawdCd: string;
  dealYm: string;
  /** YYYY-MM-DD; missing parts fall back to the requested month and day 01 */
  dealDate: string;
  name: string | null;
  areaM2: number | null;
  amountManwon: number | null;
  dealYear: number | null;
  dealMonth: number | null;
  dealDay: number | null;
  floor: number | null;
  legalDong: string | null;
  jibun: string | null;
  roadName: string | null;
  buildYear: number | null;
};

type FetchOutcomeBase = {
  records: TransactionRecord[];
  resultCode: string;
  resultMessage: string;
  totalCount: number;
};

export type FetchSuccess = FetchOutcomeBase & {
  ok: true;
  /** index into serviceKeyVariants() of the key that worked */
  keyVariant: number;
  pages: number;
};

export type FetchFailure = FetchOutcomeBase & {
  ok: false;
  failure: Failure;
};

export type FetchOutcome = FetchSuccess | FetchFailure;

export type CallOutcome = {
  product: ProductType;
  ym: string;
  ok: boolean;
  count: number;
  totalCount: number;
  resultCode: string;
  resultMessage: string;
  failure?: Failure;
};

export type RangeRequest = {
  lawdCd: string;
  endYm: string;
  monthsBack: number;
  products: ProductType[];
};

export type RangeResult = {
  lawdCd: string;
  endYm: string;
  monthsBack: number;
  months: string[];
  products: ProductType[];
  records: TransactionRecord[];
  outcomes: CallOutcome[];
  attempted: number;
  succeeded: number;
  withData: number;
  source_status: SourceStatus;
  summary: string;
  lastFailure?: Failure;
  expandedFrom?: number;
};
