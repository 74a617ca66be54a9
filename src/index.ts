export * from './vault';
export * from './otp';
