/**
 * Media format validation for submitted answer URLs
 */

export interface MediaFormatValidation {
  isValid: boolean;
  reason: string;
}

/**
 * Extract the lowercase file extension from a URL path
 * Query string and fragment are ignored
 * @returns The extension without its dot, or null when the last path segment has none
 */
export function getFileExtension(url: string): string | null {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    // Relative or malformed input: strip query and fragment by hand
    path = url.split(/[?#]/)[0] ?? '';
  }

  const lastSegment = path.slice(path.lastIndexOf('/') + 1);
  const dotIndex = lastSegment.lastIndexOf('.');
  if (dotIndex === -1) {
    return null;
  }

  const extension = lastSegment.slice(dotIndex + 1).toLowerCase();
  return extension.length > 0 ? extension : null;
}

/**
 * Check a media URL against the supported format set
 */
export function validateMediaFormat(
  url: string,
  supportedFormats: ReadonlySet<string>
): MediaFormatValidation {
  const extension = getFileExtension(url);

  if (!extension) {
    return { isValid: false, reason: 'Could not determine file format' };
  }

  if (!supportedFormats.has(extension)) {
    return {
      isValid: false,
      reason: `Unsupported file format: ${extension}. Supported formats: ${[...supportedFormats].join(', ')}`
    };
  }

  return { isValid: true, reason: 'File format is supported' };
}
