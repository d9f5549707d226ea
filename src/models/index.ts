export { PaymentRequest, type IPaymentRequest } from './PaymentRequest';
