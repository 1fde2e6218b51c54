import { ServiceReminderService } from './service-reminder.service';
import { ServiceRecordService } from './service-record.service';
import { VehicleService } from '../vehicle/vehicle.service';
import { compileTestContext, TestModels } from '../../test/testing-module';
import { FakeSmsService } from '../../test/fakes';
import { expectOk } from '../../test/results';

const recordedAt = new Date('2026-01-10T12:00:00.000Z');

describe('ServiceReminderService', () => {
  let reminders: ServiceReminderService;
  let models: TestModels;
  let sms: FakeSmsService;
  let serviceRecords: ServiceRecordService;
  let vehicleId: string;

  const addRecord = async (
    serviceType: string,
    reminderIntervalMonths?: number,
  ): Promise<void> => {
    expectOk(
      await serviceRecords.record(vehicleId, {
        service_type: serviceType,
        mileage: 42000,
        reminder_interval_months: reminderIntervalMonths,
      }),
    );
  };

  beforeEach(async () => {
    const context = await compileTestContext();
    reminders = context.module.get(ServiceReminderService);
    serviceRecords = context.module.get(ServiceRecordService);
    models = context.models;
    sms = context.sms;

    const vehicle = expectOk(
      await context.module.get(VehicleService).create('shop-1', {
        customer_name: 'Dana',
        customer_phone: '+15550100',
        make: 'Honda',
        model: 'Civic',
        year: 2019,
      }),
    );
    vehicleId = String(vehicle._id);

    jest.useFakeTimers({
      doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'],
    });
    jest.setSystemTime(recordedAt);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('findDue', () => {
    it('returns unsent reminders whose date has passed, oldest first', async () => {
      await addRecord('Brake inspection', 3);
      await addRecord('Oil change', 1);
      await addRecord('Wiper blades');

      const early = expectOk(
        await reminders.findDue(new Date('2026-02-01T00:00:00.000Z')),
      );
      expect(early).toEqual([]);

      const february = expectOk(
        await reminders.findDue(new Date('2026-02-10T00:00:00.000Z')),
      );
      expect(february.map(({ record }) => record.service_type)).toEqual([
        'Oil change',
      ]);
      expect(String(february[0].vehicle?._id)).toBe(vehicleId);

      const may = expectOk(
        await reminders.findDue(new Date('2026-05-01T00:00:00.000Z')),
      );
      expect(may.map(({ record }) => record.service_type)).toEqual([
        'Oil change',
        'Brake inspection',
      ]);
    });
  });

  describe('dispatchDue', () => {
    const runAt = new Date('2026-02-10T00:00:00.000Z');

    it('texts each due customer once and marks the reminder sent', async () => {
      await addRecord('Oil change', 1);
      const textsBefore = sms.sent.length;

      expect(expectOk(await reminders.dispatchDue(runAt))).toEqual({
        due: 1,
        sent: 1,
        skipped: 0,
        failed: 0,
      });
      expect(sms.sent.slice(textsBefore)).toEqual([
        {
          to: '+15550100',
          body: 'Hi Dana! Your 2019 Honda Civic is due for Oil change. Last service was at 42,000 miles. Reply or call Main Street Auto to schedule.',
        },
      ]);
      expect(models.serviceRecords.rows[0].reminder_sent).toBe(true);

      expect(expectOk(await reminders.dispatchDue(runAt))).toEqual({
        due: 0,
        sent: 0,
        skipped: 0,
        failed: 0,
      });
      expect(sms.sent).toHaveLength(textsBefore + 1);
    });

    it('leaves an undelivered reminder due for the next run', async () => {
      await addRecord('Oil change', 1);
      sms.deliver = false;

      expect(expectOk(await reminders.dispatchDue(runAt))).toMatchObject({
        due: 1,
        sent: 0,
        failed: 1,
      });
      expect(models.serviceRecords.rows[0].reminder_sent).toBe(false);

      sms.deliver = true;
      expect(expectOk(await reminders.dispatchDue(runAt))).toMatchObject({
        due: 1,
        sent: 1,
        failed: 0,
      });
      expect(models.serviceRecords.rows[0].reminder_sent).toBe(true);
    });

    it('skips a reminder whose vehicle is gone', async () => {
      await addRecord('Oil change', 1);
      models.vehicles.reset();

      expect(expectOk(await reminders.dispatchDue(runAt))).toEqual({
        due: 1,
        sent: 0,
        skipped: 1,
        failed: 0,
      });
      expect(models.serviceRecords.rows[0].reminder_sent).toBe(false);
    });
  });
});
