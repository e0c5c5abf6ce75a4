import { Inject, Injectable } from "@nestjs/common";

import type { ConfigDocument } from "./schemas";

export const RUNTIME_CONFIG = Symbol("RUNTIME_CONFIG");

/** Immutable view of the configuration document the process was started with. */
@Injectable()
export class RuntimeConfigService {
  constructor(@Inject(RUNTIME_CONFIG) private readonly document: ConfigDocument) {
  }

  getDocumentRef(): Readonly<ConfigDocument> {
    return this.document;
  }

  get timezone(): string {
    return this.document.timezone;
  }

  get dryRun(): boolean {
    return this.document.dry_run;
  }
}
