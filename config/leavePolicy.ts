import fs from 'fs';
import { fileURLToPath } from 'url';

/** Days per calendar year for each leave type; `null` means uncapped. */
export type LeaveAllotments = Readonly<Record<string, number | null>>;

export function parseLeaveAllotments(raw: unknown): LeaveAllotments {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('Leave policy must be an object');
  }
  const allotments: unknown = Reflect.get(raw, 'allotments');
  if (typeof allotments !== 'object' || allotments === null) {
    throw new Error('Leave policy must contain an "allotments" object');
  }

  const parsed: Record<string, number | null> = {};
  for (const [leaveType, days] of Object.entries(allotments)) {
    if (days !== null && (typeof days !== 'number' || !Number.isInteger(days) || days < 0)) {
      throw new Error(`Allotment for "${leaveType}" must be a non-negative integer or null`);
    }
    parsed[leaveType] = days;
  }
  if (Object.keys(parsed).length === 0) {
    throw new Error('Leave policy defines no leave types');
  }
  return Object.freeze(parsed);
}

const loadLeaveAllotments = (): LeaveAllotments => {
  const file = fileURLToPath(new URL('./leave-policy.json', import.meta.url));
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return parseLeaveAllotments(raw);
};

export const leaveAllotments: LeaveAllotments = loadLeaveAllotments();

export const isLeaveType = (value: string, allotments: LeaveAllotments = leaveAllotments): boolean =>
  Object.hasOwn(allotments, value);
