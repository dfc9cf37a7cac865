import { extractRoutingKey, normalizeHost, pickRequestHost } from './host-parser';

describe('host parser', () => {
  const baseDomains = ['example.com', 'eu.example.com'];

  describe('normalizeHost', () => {
    it('should strip the port and lowercase the host', () => {
      expect(normalizeHost('Acme.Example.com:8443')).toBe('acme.example.com');
    });

    it('should drop a trailing dot', () => {
      expect(normalizeHost('acme.example.com.')).toBe('acme.example.com');
    });

    it('should reject empty values and IPv6 literals', () => {
      expect(normalizeHost('   ')).toBeNull();
      expect(normalizeHost('[::1]:3000')).toBeNull();
    });
  });

  describe('extractRoutingKey', () => {
    it('should take the leftmost label under a base domain', () => {
      expect(extractRoutingKey('acme.example.com', baseDomains)).toEqual({
        host: 'acme.example.com',
        routingKey: 'acme',
        kind: 'subdomain',
      });
    });

    it('should prefer the longest matching base domain', () => {
      expect(extractRoutingKey('globex.eu.example.com', baseDomains)?.routingKey).toBe('globex');
    });

    it('should not resolve the bare base domain', () => {
      expect(extractRoutingKey('example.com', baseDomains)).toBeNull();
      expect(extractRoutingKey('eu.example.com', baseDomains)).toBeNull();
    });

    it('should treat any other host as a custom host', () => {
      expect(extractRoutingKey('shop.acme.io:443', baseDomains)).toEqual({
        host: 'shop.acme.io',
        routingKey: 'shop.acme.io',
        kind: 'custom',
      });
    });

    it('should reject malformed labels', () => {
      expect(extractRoutingKey('-acme.example.com', baseDomains)).toBeNull();
      expect(extractRoutingKey('ac_me.example.com', baseDomains)).toBeNull();
      expect(extractRoutingKey('acme..example.com', baseDomains)).toBeNull();
    });
  });

  describe('pickRequestHost', () => {
    it('should prefer the Host header', () => {
      expect(pickRequestHost({ host: 'acme.example.com', 'x-forwarded-host': 'other.example.com' })).toBe(
        'acme.example.com',
      );
    });

    it('should fall back to the first forwarded host', () => {
      expect(pickRequestHost({ 'x-forwarded-host': 'acme.example.com, proxy.internal' })).toBe(
        'acme.example.com',
      );
    });

    it('should return undefined when neither header is present', () => {
      expect(pickRequestHost({})).toBeUndefined();
    });
  });
});
