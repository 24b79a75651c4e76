/**
 * @cyberdeck/module-recon
 *
 * The deck's tools: port scanning, host discovery, ARP spoofing, WiFi and
 * Bluetooth scanning, monitor mode, deauthentication and power control.
 * Every service reaches the OS only through the kernel's CommandGate.
 */

export type { ReconDeps } from './deps.js';
export { CommandFailedError } from './errors.js';

export type { PortRow } from './nmap.js';
export { formatPortReport, parseHostDiscovery, parseNmapOutput } from './nmap.js';

export type { PortReport, PortScannerOptions, ScanResult } from './port-scanner.js';
export { FAST_SCAN_RANGE, PortScanner } from './port-scanner.js';

export type { HostDiscovery, NetworkMapperOptions } from './network-mapper.js';
export { DEFAULT_NETWORK, NetworkMapper } from './network-mapper.js';

export type {
  ActiveSpoof,
  ArpSpooferOptions,
  SpoofEnd,
  SpoofEndReason,
  SpoofRejection,
  SpoofStart,
} from './arp-spoofer.js';
export { ArpSpoofer, DEFAULT_SPOOF_DURATION_MS } from './arp-spoofer.js';

export type { SecurityClass, WifiNetwork, WifiScannerOptions } from './wifi-scanner.js';
export {
  WifiScanner,
  ZERO_BSSID,
  classifySecurity,
  formatWifiReport,
  parseNmcliWifi,
  splitTerseFields,
} from './wifi-scanner.js';

export type { DeauthOptions, DeauthRequest, MonitorModeOptions } from './wireless.js';
export { DEAUTH_COUNTS, Deauth, MonitorMode } from './wireless.js';

export type { BluetoothDevice } from './bluetooth-scanner.js';
export { BluetoothScanner, parseBluetoothDevices } from './bluetooth-scanner.js';

export type { PowerAction } from './power.js';
export { PowerControl } from './power.js';

export type { ReconInterfaces, ReconServices } from './services.js';
export { createReconServices } from './services.js';
export { createReconTools } from './tools.js';
