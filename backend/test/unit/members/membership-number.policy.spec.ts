import {
  formatMembershipNumber,
  highestMembershipNumber,
  planMembershipNumberBackfill,
} from '../../../src/modules/members/policies/membership-number.policy';

describe('membership-number.policy', () => {
  it('zero-pads to the requested width', () => {
    expect(formatMembershipNumber(42)).toBe('00042');
    expect(formatMembershipNumber(123456, 3)).toBe('123456');
  });

  it('ignores non-numeric legacy numbers when finding the maximum', () => {
    expect(highestMembershipNumber(['00007', 'LEGACY-99', null, ' 12 '])).toBe(12);
  });

  it('fills only missing numbers, continuing after the highest', () => {
    const changes = planMembershipNumberBackfill(
      [
        { id: 'a', public_id: 'pa', membership_number: '00003' },
        { id: 'b', public_id: 'pb', membership_number: null },
        { id: 'c', public_id: 'pc', membership_number: 'ABC' },
        { id: 'd', public_id: 'pd', membership_number: '  ' },
      ],
      { digits: 5, force: false },
    );

    expect(changes).toEqual([
      { playerId: 'b', publicId: 'pb', from: null, to: '00004' },
      { playerId: 'd', publicId: 'pd', from: '  ', to: '00005' },
    ]);
  });

  it('renumbers everyone in order when forced, skipping players already on target', () => {
    const changes = planMembershipNumberBackfill(
      [
        { id: 'a', public_id: 'pa', membership_number: '001' },
        { id: 'b', public_id: 'pb', membership_number: '005' },
      ],
      { digits: 3, force: true },
    );

    expect(changes).toEqual([{ playerId: 'b', publicId: 'pb', from: '005', to: '002' }]);
  });
});
