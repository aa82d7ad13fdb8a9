export const RISK_TIERS = ['Unacceptable', 'High', 'Limited', 'Minimal'] as const;

export const DEFAULT_ASSESSMENT_INSTRUCTION = `You are a compliance expert in the EU AI Act. Classify the AI system described by the user by EU AI Act risk tier: ${RISK_TIERS.join(' / ')}. State the tier first, then justify it concisely, citing the articles or annexes of the Act you relied on.`;

export const CHAT_SYSTEM_MESSAGE = 'You are a compliance expert in the EU AI Act.';

export const CHAT_CLOSING_LINE = 'Return the risk level and a short explanation.';
