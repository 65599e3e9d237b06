export const PROJECT_NAME = 'receipt-extraction';
export const VERSION = '1.0.0';
