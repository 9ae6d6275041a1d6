import type { DoctorRecord } from "@healthdesk/shared";

export const SEED_DOCTORS: readonly DoctorRecord[] = [
  {
    name: "Dr. Priya Raman",
    specialization: "Endocrinology (Diabetes Care)",
    availableTimings: "10:00 AM - 1:00 PM",
    location: "Riverside Health Clinic",
    contact: "priya.raman@example.com"
  },
  {
    name: "Dr. Marcus Hale",
    specialization: "Cardiology (Heart Specialist)",
    availableTimings: "2:00 PM - 5:00 PM",
    location: "Northgate Cardiac Center",
    contact: "marcus.hale@example.com"
  },
  {
    name: "Dr. Elena Voss",
    specialization: "Oncology (Cancer Care)",
    availableTimings: "11:00 AM - 2:00 PM",
    location: "Lakeside Cancer Institute",
    contact: "elena.voss@example.com"
  },
  {
    name: "Dr. Samuel Okafor",
    specialization: "Psychiatry (Mental Health)",
    availableTimings: "4:00 PM - 7:00 PM",
    location: "Harbor Mind Care Center",
    contact: "samuel.okafor@example.com"
  },
  {
    name: "Dr. Grace Lin",
    specialization: "General Physician",
    availableTimings: "9:00 AM - 12:00 PM",
    location: "Downtown Medical Center",
    contact: "grace.lin@example.com"
  }
];
