export const HOSTS = {
  DOWNLOAD: "https://query1.finance.yahoo.com/v7/finance/download",
  SESSION: "https://fc.yahoo.com",
  CRUMB: "https://query1.finance.yahoo.com/v1/test/getcrumb",
} as const;

export type Hosts = { [K in keyof typeof HOSTS]: string };

export function resolveHosts(customHosts?: Partial<Hosts>): Hosts {
  return {
    DOWNLOAD: customHosts?.DOWNLOAD ?? HOSTS.DOWNLOAD,
    SESSION: customHosts?.SESSION ?? HOSTS.SESSION,
    CRUMB: customHosts?.CRUMB ?? HOSTS.CRUMB,
  };
}
