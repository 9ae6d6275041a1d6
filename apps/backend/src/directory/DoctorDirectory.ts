import type { DoctorRecord } from "@healthdesk/shared";

// Append-only store of doctor records.
// - No update or delete.
// - Duplicate names are permitted.
// - Preserves insertion order.
export interface DoctorDirectory {
  list(): DoctorRecord[];
  add(record: DoctorRecord): DoctorRecord;
}

export function formatDoctorRecord(record: DoctorRecord): string {
  return [
    `Name: ${record.name}`,
    `Specialization: ${record.specialization}`,
    `Available timings: ${record.availableTimings}`,
    `Location: ${record.location}`,
    `Contact: ${record.contact}`
  ].join("\n");
}
