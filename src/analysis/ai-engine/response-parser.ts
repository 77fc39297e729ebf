/**
 * LLM响应解析
 * 模型经常在JSON外包裹代码块或说明文字，这里只取出第一个完整的JSON对象
 */

import { AIEngineError } from './interface';
import { toError } from '../../collection/utils/error-handler';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 找到从 start 开始、括号配平的对象结尾位置（跳过字符串中的括号）
 */
function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

export class ResponseParser {
  /**
   * 从响应文本中提取JSON对象
   */
  static extractJson(text: string): JsonObject {
    if (!text || text.trim() === '') {
      throw AIEngineError.parsingError('Empty response from model');
    }

    const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
    const candidate = fenced ? fenced[1] : text;
    const start = candidate.indexOf('{');
    const end = start >= 0 ? findObjectEnd(candidate, start) : -1;
    if (start < 0 || end < 0) {
      throw AIEngineError.parsingError('No JSON object found in model response');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate.slice(start, end + 1));
    } catch (error) {
      throw AIEngineError.parsingError('Model response contains invalid JSON', toError(error));
    }

    if (!isJsonObject(parsed)) {
      throw AIEngineError.parsingError('Model response JSON is not an object');
    }
    return parsed;
  }

  static getString(source: JsonObject, key: string, fallback = ''): string {
    const value = source[key];
    return typeof value === 'string' ? value.trim() : fallback;
  }

  static getStringList(source: JsonObject, key: string): string[] {
    const value = source[key];
    if (typeof value === 'string') {
      return value.trim() ? [value.trim()] : [];
    }
    if (!Array.isArray(value)) {
      return [];
    }
    return value
      .filter((item): item is string => typeof item === 'string')
      .map(item => item.trim())
      .filter(item => item !== '');
  }

  /**
   * 数值字段，接受 "85" 这样的字符串，缺失或无法解析时返回null
   */
  static getNumber(source: JsonObject, key: string): number | null {
    const value = source[key];
    const number = typeof value === 'number' ? value : typeof value === 'string' ? parseFloat(value) : NaN;
    return Number.isFinite(number) ? number : null;
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
