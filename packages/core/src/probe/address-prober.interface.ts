/**
 * Reads the IPv4 addresses the host currently has bound to an interface.
 */
export interface IAddressProber {
  /**
   * @param interfaceName - Kernel interface name, e.g. `ens5`
   * @returns Dotted-quad addresses without prefix length; empty when the
   *   interface is missing or unaddressed
   */
  getIpv4Addresses(interfaceName: string): Promise<string[]>;
}
