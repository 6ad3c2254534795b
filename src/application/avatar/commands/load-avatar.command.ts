import type { LoadAvatarPayload } from '../dto/load-avatar.dto.js';

export class LoadAvatarCommand {
  public readonly payload: LoadAvatarPayload;

  public constructor(payload: LoadAvatarPayload) {
    this.payload = payload;
  }
}
