export * from './user.model';
export * from './phone-verification.model';
export * from './password-reset-code.model';
export * from './reward.model';
export * from './application.model';
export * from './certificate.model';
export * from './notification.model';
