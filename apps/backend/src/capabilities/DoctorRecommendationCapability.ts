import type { DoctorRecord, Document } from "@healthdesk/shared";
import { z } from "zod";
import { toProviderError } from "../errors.js";
import { formatDoctorRecord, type DoctorDirectory } from "../directory/DoctorDirectory.js";
import { human, system, type LLMProvider } from "../providers/LLMProvider.js";
import { sentinelDocument, type CapabilityOutcome, type CapabilityProvider } from "./CapabilityProvider.js";

const DIRECTORY_SOURCE = "doctor-directory";

export const DOCTOR_SELECTION_PROMPT = `You are an assistant helping recommend a doctor based on a patient's health issues.
Choose the most suitable doctor from the list of available doctors. Only pick one doctor.
Return only the selected doctor's information in JSON format (no markdown), using the same fields as the list.
If you are not sure, recommend the General Physician.`;

const ChoiceSchema = z.object({ name: z.string().min(1) });

function extractJson(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

export function matchDoctorChoice(reply: string, doctors: readonly DoctorRecord[]): DoctorRecord | undefined {
  const choice = ChoiceSchema.safeParse(extractJson(reply));
  if (!choice.success) return undefined;
  const wanted = choice.data.name.trim().toLowerCase();
  return doctors.find((doctor) => doctor.name.trim().toLowerCase() === wanted);
}

export class DoctorRecommendationCapability implements CapabilityProvider {
  readonly kind = "doctor_recommendation" as const;

  constructor(private readonly oracle: LLMProvider, private readonly directory: DoctorDirectory) {}

  async invoke(query: string): Promise<CapabilityOutcome> {
    console.log(`[recommend_doctor] Finding a doctor for: ${query}`);
    const doctors = this.directory.list();
    if (doctors.length === 0) {
      return {
        kind: this.kind,
        documents: [sentinelDocument("No doctors are registered in the directory.", DIRECTORY_SOURCE)]
      };
    }

    try {
      const reply = await this.oracle.invoke([
        system(DOCTOR_SELECTION_PROMPT),
        human(`Available doctors:\n${JSON.stringify(doctors, null, 2)}\n\nPatient query: "${query}"`)
      ]);

      const chosen = matchDoctorChoice(reply.content, doctors);
      const document: Document = chosen
        ? { title: `Recommended doctor: ${chosen.name}`, body: formatDoctorRecord(chosen), sourceRef: DIRECTORY_SOURCE }
        : { title: "Recommended doctor", body: reply.content, sourceRef: DIRECTORY_SOURCE };

      console.log("[recommend_doctor] Doctor recommendation generated");
      return { kind: this.kind, documents: [document] };
    } catch (error) {
      const failure = toProviderError("recommend_doctor", error);
      console.error(`[recommend_doctor] Doctor recommendation failed: ${failure.message}`);
      return {
        kind: this.kind,
        documents: [sentinelDocument(`Error recommending doctor: ${failure.message}`, DIRECTORY_SOURCE)],
        error: failure
      };
    }
  }
}
