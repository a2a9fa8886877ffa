// Speech-to-text provider contract
export interface SpeechToTextRequest {
  audio: Buffer;
  mimeType: string;
  fileName: string;
}

export interface ModelPair {
  primary: string;
  fallback: string;
}

export interface SpeechToTextProvider {
  id: string;
  displayName: string;
  models: ModelPair;
  /** Returns the recognized text, '' when the recording holds no speech. */
  transcribe(request: SpeechToTextRequest, model: string): Promise<string>;
}
