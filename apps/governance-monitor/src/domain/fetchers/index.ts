export { SnapshotFetcher, type SnapshotFetcherOptions } from "./SnapshotFetcher.js";
export { COSMOS_STATUS, CosmosFetcher, type CosmosFetcherOptions } from "./CosmosFetcher.js";
export { TallyFetcher, type TallyFetcherOptions } from "./TallyFetcher.js";
export { SkyFetcher, type SkyFetcherOptions, type SkyScope } from "./SkyFetcher.js";
export { XrplFetcher, formatEnabledOn, type XrplFetcherOptions } from "./XrplFetcher.js";
