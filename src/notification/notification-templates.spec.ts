import {
  buildCheckInMessage,
  buildPortalUrl,
  buildServiceConfirmationMessage,
  buildServiceReminderMessage,
  buildStatusMessage,
  computeNextReminderDate,
  describeVehicle,
  humanizeStatus,
} from './notification-templates';
import { VehicleStatus } from '../vehicle/schema/vehicle.schema';

const ctx = { customerName: 'Dana', shopName: 'Main Street Auto' };

describe('notification templates', () => {
  describe('buildStatusMessage', () => {
    it.each([
      [
        VehicleStatus.CHECKED_IN,
        'Hi Dana! Your vehicle has been checked in at Main Street Auto.',
      ],
      [VehicleStatus.INSPECTION, 'Update: Your vehicle is now being inspected.'],
      [
        VehicleStatus.WAITING_PARTS,
        "Update: Your vehicle is awaiting parts. We'll notify you when work resumes.",
      ],
      [
        VehicleStatus.IN_PROGRESS,
        'Update: Your vehicle service is now in progress.',
      ],
      [
        VehicleStatus.AWAITING_WARRANTY,
        "Update: Your vehicle is awaiting warranty approval. We'll keep you posted.",
      ],
      [
        VehicleStatus.QUALITY_CHECK,
        'Update: Your vehicle is undergoing final quality check.',
      ],
      [
        VehicleStatus.READY,
        'Great news! Your vehicle is ready for pickup at Main Street Auto. Thank you for your business!',
      ],
    ])('renders %s', (status, expected) => {
      expect(buildStatusMessage(status, ctx)).toBe(expected);
    });

    it('appends the advisor note on its own line', () => {
      expect(
        buildStatusMessage(VehicleStatus.INSPECTION, ctx, 'Found a nail in the tire'),
      ).toBe(
        'Update: Your vehicle is now being inspected.\nFound a nail in the tire',
      );
    });

    it('falls back to a generic update for other statuses', () => {
      expect(buildStatusMessage('road_test', ctx)).toBe(
        'Update on your vehicle: Road Test',
      );
    });
  });

  it('title-cases status names', () => {
    expect(humanizeStatus('waiting_parts')).toBe('Waiting Parts');
    expect(humanizeStatus('ROAD_TEST')).toBe('Road Test');
  });

  it('title-cases accented status names', () => {
    expect(humanizeStatus('naïve_check')).toBe('Naïve Check');
    expect(humanizeStatus('café_étape')).toBe('Café Étape');
  });

  it('builds the portal link without doubled slashes', () => {
    expect(buildPortalUrl('https://track.example.com/', 'abc')).toBe(
      'https://track.example.com/track/abc',
    );
    expect(
      buildCheckInMessage(ctx, 'https://track.example.com/track/abc'),
    ).toBe(
      'Hi Dana! Your vehicle is checked in at Main Street Auto. Track its status here: https://track.example.com/track/abc',
    );
  });

  it('describes a vehicle from the parts it has', () => {
    expect(describeVehicle({ year: 2019, make: 'Honda', model: 'Civic' })).toBe(
      '2019 Honda Civic',
    );
    expect(describeVehicle({ year: null, make: 'Honda', model: null })).toBe(
      'Honda',
    );
    expect(describeVehicle({})).toBe('vehicle');
  });

  it('adds thirty days per month to the reminder date', () => {
    const from = new Date('2026-01-10T12:00:00.000Z');
    expect(computeNextReminderDate(from, 3).toISOString()).toBe(
      '2026-04-10T12:00:00.000Z',
    );
  });

  describe('service messages', () => {
    const vehicle = { year: 2019, make: 'Honda', model: 'Civic' };

    it('confirms a service with the next due point', () => {
      expect(
        buildServiceConfirmationMessage(ctx, vehicle, {
          serviceType: 'Oil change',
          mileage: 42000,
          nextServiceMileage: 47000,
          nextReminderDate: new Date('2026-04-10T12:00:00.000Z'),
        }),
      ).toBe(
        'Hi Dana! Oil change completed on your 2019 Honda Civic at 42,000 miles. Next service due at 47,000 miles or by 2026-04-10. Thank you for choosing Main Street Auto!',
      );
    });

    it('confirms a service with nothing scheduled', () => {
      expect(
        buildServiceConfirmationMessage(ctx, {}, {
          serviceType: 'Tire rotation',
          mileage: 800,
        }),
      ).toBe(
        'Hi Dana! Tire rotation completed on your vehicle at 800 miles. Thank you for choosing Main Street Auto!',
      );
    });

    it('reminds the customer of a due service', () => {
      expect(
        buildServiceReminderMessage(ctx, vehicle, {
          serviceType: 'Oil change',
          mileage: 42000,
          nextServiceMileage: 47000,
        }),
      ).toBe(
        'Hi Dana! Your 2019 Honda Civic is due for Oil change. Last service was at 42,000 miles. Recommended at 47,000 miles. Reply or call Main Street Auto to schedule.',
      );
      expect(
        buildServiceReminderMessage(ctx, vehicle, {
          serviceType: 'Oil change',
          mileage: 42000,
        }),
      ).toBe(
        'Hi Dana! Your 2019 Honda Civic is due for Oil change. Last service was at 42,000 miles. Reply or call Main Street Auto to schedule.',
      );
    });
  });
});
