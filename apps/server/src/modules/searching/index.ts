export { registerSearchingRoutes } from './routes';
export { createSearchingService, type SearchingService, type PairingResult } from './service';
export { compatibilityScore, normalizeInterests, rankCandidates } from './compatibility';
