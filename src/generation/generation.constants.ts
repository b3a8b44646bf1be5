export const CHAT_MODEL = 'CHAT_MODEL';
