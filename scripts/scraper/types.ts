export const NA = 'N/A';

export const PROPERTY_FIELDS = [
  'title',
  'price',
  'size',
  'address',
  'description',
  'buildingYear',
  'apartmentType',
  'debtFreePrice',
  'maintenanceCharge',
  'livingArea',
  'rooms',
  'floor',
  'totalFloors',
  'district',
  'city',
] as const;

export type PropertyField = (typeof PROPERTY_FIELDS)[number];

export type PropertyRecord = Record<PropertyField, string>;

// Fields filled from the key/value details section.
export const DETAIL_FIELDS = [
  'buildingYear',
  'apartmentType',
  'debtFreePrice',
  'maintenanceCharge',
  'livingArea',
  'rooms',
  'floor',
  'totalFloors',
  'district',
  'city',
] as const satisfies readonly PropertyField[];

export type DetailField = (typeof DETAIL_FIELDS)[number];

export const emptyRecord = (): PropertyRecord => ({
  title: NA,
  price: NA,
  size: NA,
  address: NA,
  description: NA,
  buildingYear: NA,
  apartmentType: NA,
  debtFreePrice: NA,
  maintenanceCharge: NA,
  livingArea: NA,
  rooms: NA,
  floor: NA,
  totalFloors: NA,
  district: NA,
  city: NA,
});

export type ScraperConfig = {
  baseUrl: string;
  ruleSet: string;
  pageSize: number;
  maxPages: number;
  maxListings: number;
  paginationParam: string;
  navTimeoutMs: number;
  renderTimeoutMs: number;
  settleTimeoutMs: number;
  pollIntervalMs: number;
  scrollPauseMs: number;
  maxScrollRounds: number;
  /** CSS selector list for the cookie consent button; empty disables it. */
  consentSelector: string;
  consentTimeoutMs: number;
  headless: boolean;
  outputDir: string;
  outputCsv: string;
  outputZip: string;
  zipOutput: boolean;
  delimiter: string;
};

export type HttpResponse = {
  status: number;
  body: string;
};

export interface HttpClient {
  get(url: string): Promise<HttpResponse>;
}

/** A rendered browser page held open for one discovery step. */
export interface RenderedPage {
  hasSelector(selector: string): Promise<boolean>;
  scrollToBottom(): Promise<void>;
  documentHeight(): Promise<number>;
  /** True once the document reports it has finished loading. */
  isSettled(): Promise<boolean>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface RenderingClient {
  open(url: string): Promise<RenderedPage>;
  close(): Promise<void>;
}

export interface RecordSink {
  write(records: PropertyRecord[]): Promise<string>;
}
