export interface GlobalOptions {
  verbose: boolean;
}

export interface DecodeOptions {
  crlf: boolean;
  strictChecksumCase: boolean;
}
