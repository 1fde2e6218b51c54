import { VehicleStatus } from '../vehicle/schema/vehicle.schema';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CustomerContext {
  customerName: string;
  shopName: string;
}

export interface VehicleDescriptor {
  year?: number | null;
  make?: string | null;
  model?: string | null;
}

const STATUS_MESSAGES: Record<VehicleStatus, (ctx: CustomerContext) => string> =
  {
    [VehicleStatus.CHECKED_IN]: ({ customerName, shopName }) =>
      `Hi ${customerName}! Your vehicle has been checked in at ${shopName}.`,
    [VehicleStatus.INSPECTION]: () =>
      'Update: Your vehicle is now being inspected.',
    [VehicleStatus.WAITING_PARTS]: () =>
      "Update: Your vehicle is awaiting parts. We'll notify you when work resumes.",
    [VehicleStatus.IN_PROGRESS]: () =>
      'Update: Your vehicle service is now in progress.',
    [VehicleStatus.AWAITING_WARRANTY]: () =>
      "Update: Your vehicle is awaiting warranty approval. We'll keep you posted.",
    [VehicleStatus.QUALITY_CHECK]: () =>
      'Update: Your vehicle is undergoing final quality check.',
    [VehicleStatus.READY]: ({ shopName }) =>
      `Great news! Your vehicle is ready for pickup at ${shopName}. Thank you for your business!`,
  };

const isKnownStatus = (status: string): status is VehicleStatus =>
  Object.prototype.hasOwnProperty.call(STATUS_MESSAGES, status);

/** "waiting_parts" -> "Waiting Parts" */
export function humanizeStatus(status: string): string {
  return status
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) =>
      `${boundary}${letter.toUpperCase()}`,
    );
}

export function buildStatusMessage(
  status: string,
  ctx: CustomerContext,
  note?: string | null,
): string {
  const text = isKnownStatus(status)
    ? STATUS_MESSAGES[status](ctx)
    : `Update on your vehicle: ${humanizeStatus(status)}`;

  return note ? `${text}\n${note}` : text;
}

export function buildPortalUrl(baseUrl: string, uniqueLink: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/track/${uniqueLink}`;
}

export function buildCheckInMessage(
  ctx: CustomerContext,
  portalUrl: string,
): string {
  return `Hi ${ctx.customerName}! Your vehicle is checked in at ${ctx.shopName}. Track its status here: ${portalUrl}`;
}

export function buildWarrantyMessage(awaitingWarranty: boolean): string {
  return awaitingWarranty
    ? "Update: Your vehicle is awaiting warranty approval. We'll notify you once approved and work can continue."
    : 'Good news! Warranty approved. Your vehicle service is back in progress.';
}

export function describeVehicle(vehicle: VehicleDescriptor): string {
  const label = [vehicle.year, vehicle.make, vehicle.model]
    .filter((part) => part !== null && part !== undefined && part !== '')
    .join(' ');
  return label || 'vehicle';
}

export const formatMileage = (miles: number): string =>
  miles.toLocaleString('en-US');

export const formatDate = (date: Date): string =>
  date.toISOString().slice(0, 10);

/** Next due date using a fixed 30-day month. */
export function computeNextReminderDate(
  from: Date,
  intervalMonths: number,
): Date {
  return new Date(from.getTime() + intervalMonths * 30 * DAY_MS);
}

export interface ServiceSummary {
  serviceType: string;
  mileage: number;
  nextServiceMileage?: number | null;
  nextReminderDate?: Date | null;
}

export function buildServiceConfirmationMessage(
  ctx: CustomerContext,
  vehicle: VehicleDescriptor,
  service: ServiceSummary,
): string {
  const dueParts: string[] = [];
  if (service.nextServiceMileage !== null && service.nextServiceMileage !== undefined) {
    dueParts.push(`at ${formatMileage(service.nextServiceMileage)} miles`);
  }
  if (service.nextReminderDate) {
    dueParts.push(`by ${formatDate(service.nextReminderDate)}`);
  }
  const next = dueParts.length
    ? ` Next service due ${dueParts.join(' or ')}.`
    : '';

  return (
    `Hi ${ctx.customerName}! ${service.serviceType} completed on your ${describeVehicle(vehicle)} ` +
    `at ${formatMileage(service.mileage)} miles.${next} Thank you for choosing ${ctx.shopName}!`
  );
}

export function buildServiceReminderMessage(
  ctx: CustomerContext,
  vehicle: VehicleDescriptor,
  service: ServiceSummary,
): string {
  const recommended =
    service.nextServiceMileage !== null && service.nextServiceMileage !== undefined
      ? ` Recommended at ${formatMileage(service.nextServiceMileage)} miles.`
      : '';

  return (
    `Hi ${ctx.customerName}! Your ${describeVehicle(vehicle)} is due for ${service.serviceType}. ` +
    `Last service was at ${formatMileage(service.mileage)} miles.${recommended} ` +
    `Reply or call ${ctx.shopName} to schedule.`
  );
}
