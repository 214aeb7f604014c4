export const DEFAULT_DISKSTATS_SOURCE = '/proc/diskstats';
export const DEFAULT_METRIC_PREFIX = 'linuxstats.diskstats';
export const DEFAULT_REFRESH_INTERVAL = 5000;
export const TOTAL_DEVICE_NAME = 'total';

/** /proc/diskstats reports sectors in 512-byte units regardless of the device's sector size. */
export const SECTOR_SIZE_BYTES = 512;

/** Columns preceding the counters: major, minor, device name. */
export const DISKSTATS_HEADER_FIELDS = 3;

/** Longest delay a Node.js timer honours; larger values fire after 1 ms. */
export const MAX_REFRESH_INTERVAL = 2_147_483_647;
