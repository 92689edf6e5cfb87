import { Inject, Injectable } from '@nestjs/common';
import { BackendError } from '../../common/errors/pipeline.errors';
import { TRANSLATION_BACKENDS, TranslationBackend } from './translation-backend.interface';

@Injectable()
export class TranslationBackendRegistry {
  private readonly backends = new Map<string, TranslationBackend>();

  constructor(@Inject(TRANSLATION_BACKENDS) backends: TranslationBackend[]) {
    backends.forEach((backend) => this.register(backend));
  }

  register(backend: TranslationBackend): void {
    this.backends.set(backend.name, backend);
  }

  get(name: string): TranslationBackend {
    const backend = this.backends.get(name);
    if (!backend) {
      throw BackendError.permanent(`Unknown translation backend: ${name}`);
    }
    if (!backend.isAvailable()) {
      throw BackendError.permanent(`Translation backend "${name}" is not configured`);
    }
    return backend;
  }

  names(): string[] {
    return [...this.backends.keys()];
  }
}
