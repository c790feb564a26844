/** One contact scraped from the directory page. Empty strings mean "not found". */
export interface ContactEntry {
  name: string;
  brokerage: string;
  email: string;
  phone: string;
}

export type SheetRow = [name: string, brokerage: string, email: string, phone: string];

/** Column order of the remote sheet: Name, Brokerage, Email, Phone. */
export function toSheetRow(entry: ContactEntry): SheetRow {
  return [entry.name, entry.brokerage, entry.email, entry.phone];
}
