import { createLogger, setLogger } from '@/logging/logger';

// Components log through the shared root logger; keep test output clean.
setLogger(createLogger({ level: 'silent' }));
