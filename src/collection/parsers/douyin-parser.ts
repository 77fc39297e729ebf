/**
 * 抖音搜索页解析
 * 搜索结果以URL编码的JSON嵌在 script#RENDER_DATA 中
 */

import * as cheerio from 'cheerio';
import { TrendingVideo } from '../types/product';
import { CollectionError, CollectionErrorType, toError } from '../utils/error-handler';
import { VideoUrlBuilder, mapTrendingVideo } from '../vendors/trending-video-client';
import { isObject } from '../vendors/json-fields';

export const DOUYIN_BASE_URL = 'https://www.douyin.com';

export const douyinVideoUrl: VideoUrlBuilder = videoId => `${DOUYIN_BASE_URL}/video/${videoId}`;

const MAX_DEPTH = 30;

/**
 * 视频搜索地址，话题去掉#号作为关键词
 */
export function buildSearchUrl(keyword: string, baseUrl: string = DOUYIN_BASE_URL): string {
  const term = keyword.replace(/^#/, '').trim();
  return `${baseUrl.replace(/\/+$/, '')}/search/${encodeURIComponent(term)}?type=video`;
}

function invalidRenderData(cause: unknown, length: number): CollectionError {
  return new CollectionError(
    `抖音渲染数据无法解析: ${toError(cause).message}`,
    CollectionErrorType.DATA_PARSING_ERROR,
    'douyin',
    'extractRenderData',
    { length }
  );
}

/**
 * 读取页面内嵌的渲染数据，页面中没有时返回null
 */
export function extractRenderData(html: string): unknown {
  const $ = cheerio.load(html);
  const raw = $('script#RENDER_DATA').first().text().trim();
  if (!raw) {
    return null;
  }

  let text: string;
  try {
    // 部分页面直接嵌入未编码的JSON
    text = /^[{[]/.test(raw) ? raw : decodeURIComponent(raw);
  } catch (error) {
    throw invalidRenderData(error, raw.length);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw invalidRenderData(error, raw.length);
  }
}

/**
 * 在渲染数据中查找视频对象：带 aweme_id 且有 statistics 的节点
 */
function collectAwemes(node: unknown, found: unknown[], depth: number): void {
  if (depth > MAX_DEPTH) {
    return;
  }
  if (Array.isArray(node)) {
    for (const item of node) {
      collectAwemes(item, found, depth + 1);
    }
    return;
  }
  if (!isObject(node)) {
    return;
  }
  if (node.aweme_id !== undefined && isObject(node.statistics)) {
    found.push(node);
    return;
  }
  for (const value of Object.values(node)) {
    collectAwemes(value, found, depth + 1);
  }
}

/**
 * 解析搜索页中的视频，按视频ID去重
 */
export function parseDouyinSearchPage(html: string): TrendingVideo[] {
  const data = extractRenderData(html);
  if (data === null) {
    return [];
  }

  const awemes: unknown[] = [];
  collectAwemes(data, awemes, 0);

  const videos = new Map<string, TrendingVideo>();
  for (const raw of awemes) {
    const video = mapTrendingVideo(raw, douyinVideoUrl);
    if (video && !videos.has(video.videoId)) {
      videos.set(video.videoId, video);
    }
  }
  return [...videos.values()];
}
