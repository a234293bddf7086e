/**
 * Usage text printed when no input files are given.
 */
export const HELP_TEXT = `Count character frequencies.
Use: char-freq [options] file [file2 ...]

Reads the specified files and counts how often each character occurs.

Options:
  --chars   Which chars to display results for:
            --chars=symbols          Only symbols !"#$%& etc.
            --chars=digits           Only digits 0123456789
            --chars=letters          Only letters A-Z,a-z
            --chars=symbols+digits   Symbols and digits (default)
            --chars=all              All characters
`;
