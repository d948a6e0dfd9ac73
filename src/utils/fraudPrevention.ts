import { readFileSync } from 'fs';
import os from 'os';
import { v5 as uuidv5 } from 'uuid';
import { DEFAULT_VENDOR_PRODUCT_NAME, DEFAULT_VENDOR_VERSION, DEVICE_ID_NAMESPACE } from '../constants';
import { VendorInfo } from '../types';
import { tryCatch } from '../tryCatch';

/**
 * Fraud prevention headers
 *
 * HMRC requires every request from a desktop application to describe
 * the originating device. Without the user's consent to share those
 * details, fixed placeholder values are sent instead.
 */

export interface DeviceInfo {
  localIps: string[];
  macAddresses: string[];
  /** Minutes east of UTC */
  utcOffsetMinutes: number;
  osFamily: string;
  osVersion: string;
  deviceManufacturer: string;
  deviceModel: string;
  user: string;
}

const PLACEHOLDER_MAC = '52:54:00:12:34:56';

const DMI_PATH = '/sys/devices/virtual/dmi/id';

/**
 * Gather details of the machine the SDK runs on
 */
export function collectDeviceInfo(): DeviceInfo {
  const interfaces = tryCatch(() => os.networkInterfaces()).data ?? {};
  const addresses = Object.values(interfaces).flatMap((entries) => entries ?? []);

  return {
    localIps: addresses.filter((a) => a.family === 'IPv4').map((a) => a.address),
    // One entry per address, so an interface with IPv4 and IPv6 repeats its MAC
    macAddresses: [...new Set(addresses.map((a) => a.mac))].filter((mac) => mac && mac !== '00:00:00:00:00:00'),
    utcOffsetMinutes: -new Date().getTimezoneOffset(),
    osFamily: os.type(),
    osVersion: os.release(),
    deviceManufacturer: readDmi('sys_vendor'),
    deviceModel: readDmi('product_family'),
    user: tryCatch(() => os.userInfo().username).data ?? 'Unknown',
  };
}

/**
 * Format a UTC offset as `UTC±hh:mm`
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0');
  const minutes = String(absolute % 60).padStart(2, '0');
  return `UTC${sign}${hours}:${minutes}`;
}

/**
 * Build the `Gov-Client-*` and `Gov-Vendor-*` headers
 *
 * @param device Real device details, or null to send placeholders
 * @param vendor Product identification
 * @param now Timestamp reported for the local IP addresses
 */
export function buildFraudPreventionHeaders(
  device: DeviceInfo | null,
  vendor: VendorInfo = {},
  now: Date = new Date()
): Record<string, string> {
  const productName = vendor.productName ?? DEFAULT_VENDOR_PRODUCT_NAME;
  const version = vendor.version ?? DEFAULT_VENDOR_VERSION;

  const macAddresses = device
    ? [...device.macAddresses].map(encodeURIComponent).sort().join(',')
    : encodeURIComponent(PLACEHOLDER_MAC);

  const headers: Record<string, string> = {
    'Gov-Client-Connection-Method': 'DESKTOP_APP_DIRECT',
    'Gov-Client-Device-ID': device ? uuidv5(macAddresses, DEVICE_ID_NAMESPACE) : DEVICE_ID_NAMESPACE,
    'Gov-Client-Local-IPs': device ? [...device.localIps].map(encodeURIComponent).sort().join(',') : '127.0.0.1',
    'Gov-Client-Local-IPs-Timestamp': now.toISOString(),
    'Gov-Client-MAC-Addresses': macAddresses,
    'Gov-Client-Multi-Factor': '',
    'Gov-Client-Screens': 'width=1920&height=1080&scaling-factor=1&colour-depth=24',
    'Gov-Client-Timezone': device ? formatUtcOffset(device.utcOffsetMinutes) : 'UTC+00:00',
    'Gov-Client-User-Agent': device
      ? [
          `os-family=${encodeURIComponent(device.osFamily)}`,
          `os-version=${encodeURIComponent(device.osVersion)}`,
          `device-manufacturer=${encodeURIComponent(device.deviceManufacturer)}`,
          `device-model=${encodeURIComponent(device.deviceModel)}`,
        ].join('&')
      : 'os-family=Linux&os-version=1&device-manufacturer=Intel&device-model=Computer',
    'Gov-Client-User-IDs': `os=${device ? encodeURIComponent(device.user) : 'user'}`,
    'Gov-Client-Window-Size': 'width=640&height=480',
    'Gov-Vendor-Product-Name': encodeURIComponent(productName),
    'Gov-Vendor-Version': `${encodeURIComponent(productName)}=${encodeURIComponent(version)}`,
  };

  if (vendor.licenseIds) {
    headers['Gov-Vendor-License-IDs'] = vendor.licenseIds;
  }

  return headers;
}

function readDmi(name: string): string {
  const { data } = tryCatch(() => readFileSync(`${DMI_PATH}/${name}`, 'utf8').trim());
  return data || 'Unknown';
}
