export * from './user.model';
export * from './product.model';
export * from './order.model';
export * from './order-item.model';
export * from './order-status-history.model';
