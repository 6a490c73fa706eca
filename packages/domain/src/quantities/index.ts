export * from './quantity-generator';
