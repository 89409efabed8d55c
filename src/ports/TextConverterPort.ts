export interface ConversionOptions {
  from: string; // source markup, e.g. "markdown"
  to: string; // target markup, e.g. "org"
  shiftHeadingLevelBy: number;
}

export interface TextConverterPort {
  convert(text: string, options: ConversionOptions): Promise<string>;
}
