export { DeviceDiscovery, SSDP_ADDRESS, SSDP_PORT, parseSearchResponse, searchRequest } from './ssdp.js';
export type { DeviceDiscoveryOptions, DiscoverOptions, DiscoveredDevice } from './ssdp.js';
