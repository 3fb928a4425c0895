export * from './auth-options.dto';
export * from './config-options.dto';
export * from './contacts-options.dto';
export * from './send-options.dto';
