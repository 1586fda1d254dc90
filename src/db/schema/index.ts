export { vehicleDetails } from './vehicle-details.js';
export type { VehicleDetail, NewVehicleDetail } from './vehicle-details.js';

export { recalls } from './recalls.js';
export type { Recall, NewRecall } from './recalls.js';

export { syncRuns, syncState } from './monitoring.js';
export type { SyncRun, NewSyncRun, SyncStateRow } from './monitoring.js';
