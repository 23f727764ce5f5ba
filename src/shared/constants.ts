export const SUPPORTED_AUDIO_EXTENSIONS = new Set([
  ".aac",
  ".aif",
  ".aifc",
  ".aiff",
  ".alac",
  ".ape",
  ".caf",
  ".flac",
  ".m4a",
  ".mka",
  ".mp3",
  ".ogg",
  ".opus",
  ".wav",
  ".wv",
  ".wma"
]);

export const DATA_DIR_NAME = ".scoped-shuffle";

export const CONFIG_FILE = "config.json";
export const WEIGHTS_FILE = "playback-weights.json";
export const SCOPE_FILE = "playback-scope.json";
export const SESSION_FILE = "session.json";
export const PLAYLISTS_FILE = "user-playlists.json";

export const WEIGHTS_FORMAT_VERSION = 1;
export const SESSION_FORMAT_VERSION = 1;
export const PLAYLISTS_FORMAT_VERSION = 1;

export const WEIGHT_MULTIPLIERS = [1.0, 1.6, 3.2, 4.8, 6.4] as const;

export const MIN_SHUFFLE_WEIGHT = 0.000001;

export const DEFAULT_UNPLAYABLE_REASON = "Playback failed";
export const UNTITLED_PLAYLIST_NAME = "Untitled Playlist";
export const UNKNOWN_ARTIST = "Unknown Artist";
export const UNKNOWN_ALBUM = "Unknown Album";

export const DEFAULT_SETTINGS = {
  weightFlushDelayMs: 500,
  sessionFlushDelayMs: 1000,
  hydrationConcurrency: 4,
  restoreScopeOnStartup: true
} as const;
