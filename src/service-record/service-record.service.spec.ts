import { Types } from 'mongoose';
import { ServiceRecordService } from './service-record.service';
import { VehicleService } from '../vehicle/vehicle.service';
import { compileTestContext, TestModels } from '../../test/testing-module';
import { FakeSmsService } from '../../test/fakes';
import { expectFailure, expectOk } from '../../test/results';

describe('ServiceRecordService', () => {
  let service: ServiceRecordService;
  let vehicles: VehicleService;
  let models: TestModels;
  let sms: FakeSmsService;

  beforeEach(async () => {
    const context = await compileTestContext();
    service = context.module.get(ServiceRecordService);
    vehicles = context.module.get(VehicleService);
    models = context.models;
    sms = context.sms;
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  const checkIn = async (): Promise<string> => {
    const vehicle = expectOk(
      await vehicles.create('shop-1', {
        customer_name: 'Dana',
        customer_phone: '+15550100',
        make: 'Honda',
        model: 'Civic',
        year: 2019,
      }),
    );
    return String(vehicle._id);
  };

  it('schedules the next reminder thirty days per month out', async () => {
    const vehicleId = await checkIn();
    jest.useFakeTimers({
      doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'],
    });
    jest.setSystemTime(new Date('2026-01-10T12:00:00.000Z'));

    const record = expectOk(
      await service.record(vehicleId, {
        service_type: 'Oil change',
        mileage: 42000,
        next_service_mileage: 47000,
        reminder_interval_months: 3,
      }),
    );

    expect(record.next_reminder_date?.toISOString()).toBe(
      '2026-04-10T12:00:00.000Z',
    );
    expect(record.reminder_sent).toBe(false);
    expect(sms.sent[sms.sent.length - 1]).toEqual({
      to: '+15550100',
      body: 'Hi Dana! Oil change completed on your 2019 Honda Civic at 42,000 miles. Next service due at 47,000 miles or by 2026-04-10. Thank you for choosing Main Street Auto!',
    });
  });

  it('leaves the reminder date empty without an interval', async () => {
    const vehicleId = await checkIn();

    const record = expectOk(
      await service.record(vehicleId, {
        service_type: 'Tire rotation',
        mileage: 43000,
      }),
    );

    expect(record.next_reminder_date).toBeNull();
    expect(record.reminder_interval_months).toBeNull();
  });

  it('fails with an internal error when the confirmation text throws', async () => {
    const vehicleId = await checkIn();
    jest.spyOn(sms, 'send').mockRejectedValueOnce(new Error('carrier down'));

    const error = expectFailure(
      await service.record(vehicleId, {
        service_type: 'Oil change',
        mileage: 42000,
      }),
    );

    expect(error).toMatchObject({
      kind: 'internal',
      message: 'Failed to send service confirmation',
    });
    // the record was saved before the text went out
    expect(models.serviceRecords.rows).toHaveLength(1);
    expect(models.serviceRecords.rows[0].service_type).toBe('Oil change');
  });

  it('rejects a record for an unknown vehicle', async () => {
    const error = expectFailure(
      await service.record(new Types.ObjectId().toHexString(), {
        service_type: 'Oil change',
        mileage: 42000,
      }),
    );

    expect(error.kind).toBe('not_found');
    expect(models.serviceRecords.rows).toHaveLength(0);
  });

  it('rejects a negative mileage', async () => {
    const vehicleId = await checkIn();
    const error = expectFailure(
      await service.record(vehicleId, { service_type: 'Oil change', mileage: -5 }),
    );
    expect(error).toEqual({
      kind: 'validation',
      message: 'mileage must be a non-negative number',
    });
  });

  it('lists records newest first', async () => {
    const vehicleId = await checkIn();
    jest.useFakeTimers({
      doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'],
    });
    jest.setSystemTime(new Date('2026-01-10T12:00:00.000Z'));
    expectOk(
      await service.record(vehicleId, { service_type: 'Oil change', mileage: 42000 }),
    );
    jest.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    expectOk(
      await service.record(vehicleId, { service_type: 'Brake service', mileage: 44500 }),
    );

    const records = expectOk(await service.findByVehicle(vehicleId));
    expect(records.map((record) => record.service_type)).toEqual([
      'Brake service',
      'Oil change',
    ]);
  });
});
