export const STITCH_DIRECTIONS = ["horizontal", "vertical"] as const;
export type StitchDirection = (typeof STITCH_DIRECTIONS)[number];

export const OUTPUT_FORMATS = ["tiff", "png"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const ALIGNMENTS = ["start", "center"] as const;
export type Alignment = (typeof ALIGNMENTS)[number];

export const SEQUENCE_ACTIONS = ["number", "unnumber"] as const;
export type SequenceAction = (typeof SEQUENCE_ACTIONS)[number];

export const DEFAULT_EXTENSIONS = [".png", ".tif", ".tiff"] as const;
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = "tiff";
export const DEFAULT_BACKGROUND = { r: 255, g: 255, b: 255 } as const;

export const OUTPUT_EXTENSIONS: Record<OutputFormat, string> = {
  tiff: ".tif",
  png: ".png",
};

export const PNG_COMPRESSION_LEVEL = 6;
export const TIFF_COMPRESSION = "lzw";

// Outputs land next to their inputs as stitched_<label>[_<tokens>][_<n>].<ext>
export const OUTPUT_NAME_PREFIX = "stitched";

// "12 scan.png" style prefix written by the sequencer
export const NUMBER_PREFIX_PATTERN = /^(\d+)\s/;

// Stem suffix used to flag a mismatching tile
export const MARK_SUFFIX = "z";

export const ENV_BACKGROUND = "IMAGE_STITCHER_BACKGROUND";
export const ENV_EXTENSIONS = "IMAGE_STITCHER_EXTENSIONS";
export const ENV_FORMAT = "IMAGE_STITCHER_FORMAT";

export const LOG_PREFIX = "[image-stitcher]";

// Upper bound for grid enumeration input
export const MAX_GRID_TILES = 10000;

// Longest digit run read as a tile number
export const MAX_TILE_NUMBER_DIGITS = 15;
