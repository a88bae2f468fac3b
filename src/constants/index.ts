export * from './order.constants';
export * from './user.constants';
export * from './product.constants';
