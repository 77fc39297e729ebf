/**
 * 商品趋势雷达
 */

export * from './collection';
export * from './analysis';
export * from './db';
export * from './report';
export * from './pipeline';
export * from './system';
