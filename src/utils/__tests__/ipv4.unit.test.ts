import {
  broadcastOf,
  formatSubnet,
  hostAddresses,
  intToIPv4,
  ipv4ToInt,
  isLinkLocal,
  isLoopback,
  isValidIPv4,
  subnetOf,
  subnetSize,
} from '../ipv4';

describe('ipv4 helpers', () => {
  describe('isValidIPv4', () => {
    it('accepts dotted quads', () => {
      expect(isValidIPv4('192.168.1.10')).toBe(true);
      expect(isValidIPv4('0.0.0.0')).toBe(true);
    });

    it('rejects hostnames, IPv6 and out-of-range octets', () => {
      expect(isValidIPv4('not-an-ip')).toBe(false);
      expect(isValidIPv4('::1')).toBe(false);
      expect(isValidIPv4('256.1.1.1')).toBe(false);
      expect(isValidIPv4('')).toBe(false);
    });
  });

  it('converts between dotted and integer forms', () => {
    expect(ipv4ToInt('10.0.0.1')).toBe(167772161);
    expect(ipv4ToInt('255.255.255.255')).toBe(4294967295);
    expect(intToIPv4(167772161)).toBe('10.0.0.1');
    expect(intToIPv4(4294967295)).toBe('255.255.255.255');
  });

  it('throws on invalid input to ipv4ToInt', () => {
    expect(() => ipv4ToInt('10.0.0')).toThrow('Not an IPv4 address: 10.0.0');
  });

  it('derives the subnet of an address', () => {
    const subnet = subnetOf('192.168.1.77', 24);
    expect(formatSubnet(subnet)).toBe('192.168.1.0/24');
    expect(subnetSize(subnet)).toBe(256);
    expect(intToIPv4(broadcastOf(subnet))).toBe('192.168.1.255');
    expect(formatSubnet(subnetOf('10.20.30.40', 22))).toBe('10.20.28.0/22');
  });

  describe('hostAddresses', () => {
    it('excludes the network and broadcast addresses', () => {
      const addresses = Array.from(hostAddresses(subnetOf('192.168.5.9', 29)));
      expect(addresses).toEqual([
        '192.168.5.9',
        '192.168.5.10',
        '192.168.5.11',
        '192.168.5.12',
        '192.168.5.13',
        '192.168.5.14',
      ]);
    });

    it('yields 254 addresses for a /24', () => {
      const addresses = Array.from(hostAddresses(subnetOf('10.1.2.3', 24)));
      expect(addresses).toHaveLength(254);
      expect(addresses[0]).toBe('10.1.2.1');
      expect(addresses[253]).toBe('10.1.2.254');
    });

    it('yields nothing for /31 and /32', () => {
      expect(Array.from(hostAddresses(subnetOf('10.1.2.3', 31)))).toEqual([]);
      expect(Array.from(hostAddresses(subnetOf('10.1.2.3', 32)))).toEqual([]);
    });
  });

  it('recognizes loopback and link-local addresses', () => {
    expect(isLoopback('127.0.0.1')).toBe(true);
    expect(isLoopback('127.8.0.1')).toBe(true);
    expect(isLoopback('10.0.0.1')).toBe(false);
    expect(isLinkLocal('169.254.10.1')).toBe(true);
    expect(isLinkLocal('192.168.0.1')).toBe(false);
  });
});
