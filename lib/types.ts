export type ProxyProtocol = 'http' | 'https' | 'socks5';

export interface ProxyEndpoint {
  readonly url: string; // always carries a scheme, e.g. "http://10.0.0.1:8080"
  readonly protocol: ProxyProtocol;
}

/** Empty pool means direct connection. */
export type ProxyPool = readonly ProxyEndpoint[];

export type ProxyStrategy = 'first' | 'random' | 'round-robin';

/**
 * One validated entry of the crt.sh JSON array. `name_value` holds one or
 * more newline-separated hostnames; other fields are kept as delivered.
 */
export interface CertificateRecord {
  name_value?: string;
  [key: string]: unknown;
}

export type OutputFormat = 'txt' | 'json' | 'csv';

export interface ScanResult {
  readonly domain: string;
  readonly subdomains: readonly string[]; // sorted
  readonly responseTimeS: number;
  readonly proxy: ProxyEndpoint | null;
  readonly keyword?: string;
  readonly limit?: number;
}

export interface BatchEntry {
  count: number;
  proxy: ProxyEndpoint | null;
  subdomains: string[];
}

export interface BatchSummary {
  entries: Map<string, BatchEntry>;
  domainsScanned: number;
  proxiesAvailable: number;
  totalSubdomains: number;
}

export interface ProxyCheck {
  proxy: ProxyEndpoint;
  working: boolean;
  failure?: string;
}

export interface ProxyTestReport {
  working: ProxyEndpoint[];
  failed: ProxyCheck[];
}
