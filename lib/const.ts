export const PACKAGE_NAME = "alfred-mpd";

// Separates the fields of a track in `mpc -f` output:
// non-breaking space, eighth note, non-breaking space.
export const DELIMITER = "\u00a0\u266a\u00a0";

export const TRACK_FIELDS = [
	"artist",
	"album",
	"disc",
	"track",
	"title",
	"file",
] as const;

export const RESULT_FORMAT = TRACK_FIELDS.map((field) => `%${field}%`).join(
	DELIMITER,
);

// Search types understood by MPD's `search` and `find` commands.
export const SEARCH_TYPES = [
	"any",
	"file",
	"base",
	"modified-since",
	"artist",
	"artistsort",
	"album",
	"albumsort",
	"albumartist",
	"albumartistsort",
	"title",
	"titlesort",
	"track",
	"name",
	"genre",
	"mood",
	"date",
	"originaldate",
	"composer",
	"composersort",
	"performer",
	"conductor",
	"work",
	"ensemble",
	"movement",
	"movementnumber",
	"location",
	"grouping",
	"comment",
	"disc",
	"label",
] as const;

// Server errors meaning MPD couldn't be reached at all.
export const CONNECTION_ERRORS = [
	"Connection refused",
	"Failed to resolve host name",
	"No route to host",
] as const;
export const INVALID_TYPE_MARKER = "is not a valid search type";

// Stock macOS icons, as used by most Alfred workflows.
const ICON_ROOT = "/System/Library/CoreServices/CoreTypes.bundle/Contents/Resources";
export const ICON_ERROR = `${ICON_ROOT}/AlertStopIcon.icns`;
export const ICON_WARNING = `${ICON_ROOT}/AlertCautionIcon.icns`;
export const ICON_INFO = `${ICON_ROOT}/ToolbarInfo.icns`;
