import type { SpeechToTextProvider, TranscribeOptions, TranscriptionResult } from '../types';

export class DisabledSttProvider implements SpeechToTextProvider {
  public readonly id = 'disabled';
  public readonly model = 'none';

  public async transcribe(_wav: Buffer, _opts: TranscribeOptions = {}): Promise<TranscriptionResult> {
    return { text: '', confidence: 0 };
  }

  public async healthCheck(): Promise<boolean> {
    return true;
  }
}
