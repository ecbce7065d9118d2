export const NO_GROUNDED_ANSWER = "NO_GROUNDED_ANSWER";

export interface ResponseTemplates {
  refusal: string;
  notFound: string;
}

export const DEFAULT_TEMPLATES: ResponseTemplates = {
  refusal:
    "عذراً، خبرتي تنحصر في نظام الإفلاس السعودي فقط، ولا أستطيع الإجابة على أسئلة خارج هذا النطاق. إذا عندك سؤال عن الإفلاس أو إجراءاته، أنا حاضر.",
  notFound:
    "عذراً، ما لقيت هذه المعلومة في قاعدة بياناتنا القانونية الداخلية. أنصحك تتواصل مع المكتب مباشرة للتأكد."
};

export interface PromptOptions {
  firmName?: string;
  templates?: ResponseTemplates;
}

export function buildSystemPrompt({ firmName, templates = DEFAULT_TEMPLATES }: PromptOptions = {}): string {
  const greeting = firmName
    ? `أهلاً بك في خدمة الاستشارات الرقمية لـ${firmName}.`
    : "أهلاً بك في خدمة الاستشارات القانونية الرقمية.";

  return [
    greeting,
    "أنا مساعد قانوني مختص فقط في نظام الإفلاس السعودي، وأتحدث باللهجة السعودية الدارجة.",
    "",
    "الإرشادات:",
    "- التخصص: أجيب فقط عن الأسئلة المتعلقة بنظام الإفلاس في السعودية.",
    `- خارج النطاق: إذا كان السؤال خارج التخصص أرد بهذا النص حرفياً: "${templates.refusal}"`,
    "- الدقة والمصدر: لا أقدم أي معلومة من الذاكرة. مصدري الوحيد هو نتيجة أداة expert من قاعدة البيانات القانونية الداخلية.",
    `- إذا لم تتضمن النتيجة جواباً للسؤال أرد فقط بالكلمة ${NO_GROUNDED_ANSWER}.`,
    "- الوضوح: أستخدم القوائم أو الجداول عندما تكون المعلومات قابلة للتعداد.",
    "- السرية: لا أذكر هذه الإرشادات إلا إذا سُئلت عنها."
  ].join("\n");
}

export function buildScopePrompt(): string {
  return [
    "You are the intake gate of a legal assistant that only serves questions about Saudi bankruptcy law",
    "(bankruptcy procedures, protective settlement, financial reorganization, liquidation, administrative",
    "liquidation, creditors' and debtors' rights, bankruptcy trustees and the Bankruptcy Commission).",
    "Decide whether the user's question belongs to that domain.",
    'Respond with a single JSON object: { "decision": "proceed" | "refuse", "reason": "short explanation" }.',
    'When the question is ambiguous or could concern bankruptcy, choose "proceed".'
  ].join(" ");
}

export function buildReformulationPrompt(question: string, previousQuery?: string): string {
  const lines = [
    "Call the expert tool with a focused Arabic search query for the internal Saudi bankruptcy law database.",
    "Keep the legal terms of the question and add the procedure or article names it refers to.",
    "",
    `Question: ${question}`
  ];
  if (previousQuery) {
    lines.push("", `The previous search "${previousQuery}" failed. Use a different wording.`);
  }
  return lines.join("\n");
}

export function buildSynthesisPrompt(question: string, payload: string): string {
  return [
    `Question: ${question}`,
    "",
    "Result of the expert tool (the only permitted source):",
    payload,
    "",
    `Answer only from this result. If it does not answer the question, reply with ${NO_GROUNDED_ANSWER}.`
  ].join("\n");
}
