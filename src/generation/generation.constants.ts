export const CHAT_MODEL_FACTORY = 'CHAT_MODEL_FACTORY';

export const SECTION_TEMPERATURE = 0.7;
export const SECTION_MAX_TOKENS = 4096;
export const CRITERIA_TEMPERATURE = 0.3;
export const CRITERIA_MAX_TOKENS = 500;
