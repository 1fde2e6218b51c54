import { Types } from 'mongoose';
import { ApprovalService } from './approval.service';
import { VehicleService } from '../vehicle/vehicle.service';
import { compileTestContext, TestModels } from '../../test/testing-module';
import { expectFailure, expectOk } from '../../test/results';

describe('ApprovalService', () => {
  let service: ApprovalService;
  let models: TestModels;
  let vehicleId: string;

  beforeEach(async () => {
    const context = await compileTestContext();
    service = context.module.get(ApprovalService);
    models = context.models;
    const vehicle = expectOk(
      await context.module.get(VehicleService).create('shop-1', {
        customer_name: 'Dana',
        customer_phone: '+15550100',
      }),
    );
    vehicleId = String(vehicle._id);
  });

  it('opens an approval with no answer', async () => {
    const approval = expectOk(
      await service.create(vehicleId, {
        description: 'Replace brake pads',
        cost: 180.5,
      }),
    );

    expect(approval).toMatchObject({
      vehicle_id: vehicleId,
      description: 'Replace brake pads',
      cost: 180.5,
      approved: null,
      approved_at: null,
    });
  });

  it('records the first answer and refuses a second one', async () => {
    const approval = expectOk(
      await service.create(vehicleId, { description: 'New battery', cost: 140 }),
    );
    const approvalId = String(approval._id);

    const answered = expectOk(await service.respond(approvalId, true));
    expect(answered.approved).toBe(true);
    expect(answered.approved_at).toBeInstanceOf(Date);

    const error = expectFailure(await service.respond(approvalId, false));
    expect(error).toEqual({
      kind: 'validation',
      message: `Approval ${approvalId} has already been answered`,
    });
    expect(models.approvals.rows[0].approved).toBe(true);
  });

  it('reports an unknown approval as not found', async () => {
    const missing = new Types.ObjectId().toHexString();
    expect(expectFailure(await service.respond(missing, true)).kind).toBe(
      'not_found',
    );
    expect(expectFailure(await service.respond('nope', true)).kind).toBe(
      'not_found',
    );
  });

  it('refuses an approval for an unknown vehicle', async () => {
    const error = expectFailure(
      await service.create(new Types.ObjectId().toHexString(), {
        description: 'Alignment',
        cost: 90,
      }),
    );
    expect(error.kind).toBe('not_found');
    expect(models.approvals.rows).toHaveLength(0);
  });

  it('lists approvals in the order they were requested', async () => {
    expectOk(await service.create(vehicleId, { description: 'First', cost: 10 }));
    expectOk(await service.create(vehicleId, { description: 'Second', cost: 20 }));

    const approvals = expectOk(await service.findByVehicle(vehicleId));
    expect(approvals.map((approval) => approval.description)).toEqual([
      'First',
      'Second',
    ]);
  });
});
