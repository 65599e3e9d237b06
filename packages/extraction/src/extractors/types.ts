/**
 * Contract shared by every field extractor: a named, stateless function of the
 * raw text. Extractors never throw for "nothing found"; they return null or an
 * empty list and leave failure handling to the pipeline.
 */
export interface FieldExtractor<T> {
  /** Field name used in logs and error reports */
  field: string;
  extract(text: string): T;
}
