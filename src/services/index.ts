// Export all services
export * from './BaseComponent';
export * from './LoggingNotifier';
export * from './KeyPhraseMatcher';
export * from './ComponentRegistry';
export * from './ConfigurationManager';
export * from './ErrorHandler';
export * from './Dispatcher';
export * from './StatusServer';
