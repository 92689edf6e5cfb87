import { NumberedLine } from './numbered-lines';

export interface CompleteOptions {
  signal?: AbortSignal;
}

/**
 * 大模型翻译服务
 * prompt 为指令，lines 为本批次待翻译的编号行；返回模型原始文本，由调用方解析
 */
export interface TranslationBackend {
  readonly name: string;
  isAvailable(): boolean;
  /**
   * @throws BackendError
   */
  complete(prompt: string, lines: readonly NumberedLine[], options: CompleteOptions): Promise<string>;
}

export const TRANSLATION_BACKENDS = Symbol('TRANSLATION_BACKENDS');
