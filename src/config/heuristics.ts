// Keyword heuristics applied to the lower-cased README + dependency text

export const DEFAULT_DOMAIN_VOCABULARY = ['finance', 'health', 'education', 'surveillance', 'credit'] as const;

export const BIOMETRIC_TERMS = ['biometric', 'face'] as const;

export const HUMAN_OVERSIGHT_TERMS = ['human-in-the-loop', 'human in loop'] as const;

export const NO_LICENSE = 'none';

export const GENERAL_DOMAIN = 'general';
