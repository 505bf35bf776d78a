const MATH_TERMS = [
  "calculate",
  "solve",
  "equation",
  "math",
  "arithmetic",
  "algebra",
  "geometry",
  "calculus",
  "trigonometry",
  "computation",
  "formula",
  "square root",
  "derivative",
  "integral",
];

const MATH_OPERATORS = /[+\-*/=^]/u;

export function isMathProblem(prompt: string): boolean {
  const text = prompt.toLowerCase();
  return MATH_OPERATORS.test(text) || MATH_TERMS.some((term) => text.includes(term));
}

/**
 * Reasoning models answer best when told to think first; math prompts also ask
 * for the final answer in \boxed{}.
 */
export function wrapForReasoning(prompt: string): string {
  if (isMathProblem(prompt)) {
    return (
      "Please answer the following math problem. Start your response with <think> to show your " +
      "reasoning step by step, and put your final answer within \\boxed{}.\n\n" +
      `Problem: ${prompt}`
    );
  }
  return (
    "Please answer the following question. Start your response with <think> to show your " +
    "reasoning, then give your final answer.\n\n" +
    `Question: ${prompt}`
  );
}
