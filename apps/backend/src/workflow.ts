export const WORKFLOW_DESCRIPTION = `Health assistant workflow

User question -> Planner -> Tool selection -> Tool execution -> Final answer

1. Reasoning: the assistant decides which tools the question needs.
2. Tool selection: web search, research papers, doctor recommendation, or several of them.
3. Tool execution: each selected tool runs once, in order; a failing tool never stops the others.
4. Final answer: all tool results are combined into one structured response.

Planners:
- Autonomous agent: the model calls tools itself, step by step, until it can answer.
- Deterministic planner: the model names tools with "TOOL: <name>" lines; keyword rules add
  search_arxiv for research questions and recommend_doctor for doctor requests; search_web is
  the default when nothing else applies. Used whenever the autonomous agent is unavailable or fails.

Available tools:
- search_web: current health information from the web
- search_arxiv: scientific studies from arXiv
- recommend_doctor: one doctor from the directory, the General Physician when unsure`;
