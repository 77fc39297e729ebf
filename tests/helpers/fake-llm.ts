/**
 * 测试用LLM客户端：按顺序返回预设回答，记录所有请求
 */

import {
  LLMClient,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ClientInfo
} from '../../src/analysis/ai-engine/interface';

export type ScriptedReply = string | Error;

export class ScriptedLLMClient implements LLMClient {
  public requests: ChatCompletionRequest[] = [];
  private replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  async chatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('no scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      id: `reply-${this.requests.length}`,
      model: 'fake-model',
      content: reply,
      finishReason: 'stop',
      usage: { promptTokens: 10, completionTokens: 10, totalTokens: 20 }
    };
  }

  getClientInfo(): ClientInfo {
    return { provider: 'fake', model: 'fake-model', features: ['chat_completion'] };
  }
}
