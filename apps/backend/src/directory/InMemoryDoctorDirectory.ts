import type { DoctorRecord } from "@healthdesk/shared";
import type { DoctorDirectory } from "./DoctorDirectory.js";

// Process-lifetime storage. Records are copied on the way in and out
// so callers never hold a reference to stored state.
export class InMemoryDoctorDirectory implements DoctorDirectory {
  private readonly records: DoctorRecord[];

  constructor(seed: readonly DoctorRecord[] = []) {
    this.records = seed.map((record) => ({ ...record }));
  }

  list(): DoctorRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  add(record: DoctorRecord): DoctorRecord {
    const stored = { ...record };
    this.records.push(stored);
    console.log(`[DoctorDirectory] Added new doctor: ${stored.name}`);
    return { ...stored };
  }
}
