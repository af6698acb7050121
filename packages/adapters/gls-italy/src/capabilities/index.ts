export { submitShipments } from './parcels.js';
export { confirmOpenShipments } from './close-work-day.js';
export { queryStatus, listShipments } from './status.js';
