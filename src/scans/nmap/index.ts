export { DetailedNmapScan } from "./detailed-scan.js";
export { NmapScan, type NmapOutputFiles, type NmapScanOptions } from "./nmap-scan.js";
export { QuickNmapScan } from "./quick-scan.js";
export { FORCE_VULN_SCAN_KEY, VulnNmapScan } from "./vuln-scan.js";
