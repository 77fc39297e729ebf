/**
 * 数据采集模块入口文件
 */

// 类型定义
export * from './types/product';

// 工具类
export * from './utils/logger';
export * from './utils/error-handler';
export * from './validator';

// 页面获取与解析
export * from './http/page-fetcher';
export * from './parsers/ads-intel-parser';
export * from './vendors/trending-video-client';

// 采集器
export * from './collectors/base-collector';
export * from './collectors/ads-intel-collector';
export * from './collectors/vendor-collector';

// 标准化
export * from './hashtags';
export * from './normalizer';
