export { generateTotp, generateHotp, dynamicTruncate, type OtpCode } from './totp';
