/** Write command output to stdout. Logs go to stderr, so this stays pipeable. */
export function print(text: string, newline = true): void {
  process.stdout.write(text + (newline ? '\n' : ''));
}

/** Write a user-facing error line to stderr. */
export function printError(text: string): void {
  process.stderr.write(text + '\n');
}

export function printHelp(): void {
  print(`
bw-session - Query a Bitwarden vault through the bw CLI

Usage:
  bw-session get <field> <search>     Print one field (password, username, totp, ...)
  bw-session item <search>            Print an item as JSON
  bw-session template <name>          Print a template as JSON (item, folder, ...)
  bw-session list <type> [filters]    Print a JSON array (items, folders, ...)
  bw-session --help                   Show this help

Options:
  -u, --user <email>    Account to log in with (default: session.username in config.yaml)
  -h, --help            Show help

List filters:
  --search <text>  --url <url>  --folderid <id>  --collectionid <id>
  --organizationid <id>  --trash

The master password is read from BW_PASSWORD when set, otherwise through pinentry.
Every command logs in first and logs out when it finishes.
`);
}
