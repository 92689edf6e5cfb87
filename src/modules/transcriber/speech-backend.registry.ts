import { Inject, Injectable, Logger } from '@nestjs/common';
import { BackendError } from '../../common/errors/pipeline.errors';
import { SPEECH_BACKENDS, SpeechBackend } from './speech-backend.interface';

@Injectable()
export class SpeechBackendRegistry {
  private readonly logger = new Logger(SpeechBackendRegistry.name);
  private readonly backends = new Map<string, SpeechBackend>();

  constructor(@Inject(SPEECH_BACKENDS) backends: SpeechBackend[]) {
    backends.forEach((backend) => this.register(backend));
  }

  register(backend: SpeechBackend): void {
    this.backends.set(backend.name, backend);
    this.logger.log(`Speech backend registered: ${backend.name}`);
  }

  /**
   * 按名称获取可用的语音识别服务
   * 未注册或未配置凭据视为永久错误
   */
  get(name: string): SpeechBackend {
    const backend = this.backends.get(name);
    if (!backend) {
      throw BackendError.permanent(`Unknown speech backend: ${name}`);
    }
    if (!backend.isAvailable()) {
      throw BackendError.permanent(`Speech backend "${name}" is not configured`);
    }
    return backend;
  }

  names(): string[] {
    return [...this.backends.keys()];
  }
}
