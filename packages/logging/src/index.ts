export * from './context';
export * from './logger';
export {sanitizeForLog} from './redaction';
