import { ALICE, BOB, ClientBuilder } from '../../testing';
import { Client } from './client';

describe('Client', () => {
  it('should derive total purchase from the preference frequency', () => {
    expect(ALICE.totalPurchase).toBe(7);
    expect(new ClientBuilder().withProductPreference('Tea').build().totalPurchase).toBe(1);
    expect(new ClientBuilder().withoutProductPreference().build().totalPurchase).toBe(0);
  });

  it('should store tags as a deduplicated, ordered set', () => {
    const client = new ClientBuilder().withTags('vip', 'friends', 'vip').build();
    expect(client.tags.map((tag) => tag.tagName)).toEqual(['friends', 'vip']);
  });

  it.each(['name', 'phone', 'email', 'address', 'tags'])('should require %s', (field) => {
    const fields = { name: ALICE.name, phone: ALICE.phone, email: ALICE.email, address: ALICE.address, tags: [] };

    for (const missing of [null, undefined]) {
      expect(() => Reflect.construct(Client, [{ ...fields, [field]: missing }])).toThrow(
        new TypeError(`Client ${field} must be present`),
      );
    }
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(ALICE)).toBe(true);
  });

  describe('isSameClient', () => {
    it('should match the same object', () => {
      expect(ALICE.isSameClient(ALICE)).toBe(true);
    });

    it('should not match null or undefined', () => {
      expect(ALICE.isSameClient(null)).toBe(false);
      expect(ALICE.isSameClient(undefined)).toBe(false);
    });

    it('should match when name, phone and address agree, whatever else differs', () => {
      const edited = ClientBuilder.from(ALICE)
        .withEmail('other@example.com')
        .withTags('vip')
        .withProductPreference('Soap', 1)
        .withDescription('Prefers email')
        .withPriority(1)
        .build();
      expect(ALICE.isSameClient(edited)).toBe(true);
    });

    it('should not match when the phone differs', () => {
      expect(ALICE.isSameClient(ClientBuilder.from(ALICE).withPhone('61234567').build())).toBe(false);
    });

    it('should not match when the address differs', () => {
      expect(ALICE.isSameClient(ClientBuilder.from(ALICE).withAddress('Elsewhere').build())).toBe(false);
    });

    it('should ignore letter case in the name, since names are stored in title case', () => {
      expect(ALICE.isSameClient(ClientBuilder.from(ALICE).withName('alice pauline').build())).toBe(true);
    });
  });

  describe('equals', () => {
    it('should match a copy with the same values', () => {
      expect(ALICE.equals(ClientBuilder.from(ALICE).build())).toBe(true);
    });

    it('should not match a different client', () => {
      expect(ALICE.equals(BOB)).toBe(false);
      expect(ALICE.equals(null)).toBe(false);
    });

    it.each([
      ['email', (b: ClientBuilder) => b.withEmail('other@example.com')],
      ['tags', (b: ClientBuilder) => b.withTags('vip')],
      ['product preference', (b: ClientBuilder) => b.withProductPreference('Shampoo', 8)],
      ['description', (b: ClientBuilder) => b.withDescription('New note')],
      ['priority', (b: ClientBuilder) => b.withPriority(1)],
    ])('should not match when the %s differs', (_field, change) => {
      expect(ALICE.equals(change(ClientBuilder.from(ALICE)).build())).toBe(false);
    });
  });

  it('should describe every field in toString', () => {
    expect(BOB.toString()).toBe(
      'Client{name=Bob Choo, phone=82222222, email=bob@example.com, address=Block 123, Bobby Street 3, ' +
        'tags=[friend][husband], productPreference=, totalPurchase=0, description=, priority=2}',
    );
  });
});
