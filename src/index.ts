export * from './domain/avatar/index.js';
export * from './domain/download/contracts/downloaders.js';
export * from './domain/download/video-options.js';

export { AvatarView, placeholderGrid } from './application/avatar/avatar-view.js';
export type { AvatarLoadResult, AvatarViewOptions, AvatarViewStatus } from './application/avatar/avatar-view.js';
export { LoadAvatarCommand } from './application/avatar/commands/load-avatar.command.js';
export { LoadAvatarHandler } from './application/avatar/handlers/load-avatar.handler.js';
export type { LoadAvatarOutcome } from './application/avatar/handlers/load-avatar.handler.js';
export { DownloadUrlCommand } from './application/download/commands/download-url.command.js';
export type { DownloadInteraction } from './application/download/commands/download-url.command.js';
export { DownloadUrlHandler } from './application/download/handlers/download-url.handler.js';
export type { DownloadOutcome } from './application/download/handlers/download-url.handler.js';

export { resolveFrameSource } from './infrastructure/avatar/frame-source-resolver.js';
export { ensureFramesDir } from './infrastructure/avatar/assets/placeholder-frames.js';
export { BrailleRenderer } from './infrastructure/avatar/renderers/braille.renderer.js';
export { HalfBlockRenderer } from './infrastructure/avatar/renderers/half-block.renderer.js';
export { loadExternalPixelCapability } from './infrastructure/avatar/renderers/external-pixel.renderer.js';
export { GlyphRendererRegistry } from './infrastructure/avatar/renderers/renderer-registry.js';
export { NodeTimerScheduler } from './infrastructure/avatar/timers/node-timer-scheduler.js';
export { extractImageItems } from './infrastructure/download/image-scraper.js';
export { HttpImageDownloader } from './infrastructure/download/http-downloader.js';
export { YtDlpClient } from './infrastructure/download/ytdlp-client.js';

export { AppError } from './shared/errors/app-error.js';
export { TtyScrapeError } from './shared/errors/base.error.js';
export { loadUiSettings, saveUiSettings } from './shared/config/settings.js';
export type { UiSettings } from './shared/config/settings.js';
