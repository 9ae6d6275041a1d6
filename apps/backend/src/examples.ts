// Multi-tool questions offered to the UI as starting points.
export const EXAMPLE_QUESTIONS: readonly string[] = [
  "Can you summarize the latest research on intermittent fasting and diabetes management, and recommend a doctor I could consult about it?",
  "What are the current guidelines for heart disease prevention, and which cardiologist can I consult?",
  "What do recent studies on exercise and mental health reveal, especially arXiv papers?",
  "I have recurring migraines. Can you search for recent treatments and also recommend a specialist I should consult?",
  "What does research say about new treatments for breast cancer, and which oncologist could I consult locally?",
  "I have a persistent cough and shortness of breath. What are possible causes and which specialist should I see?"
];
