// Sent verbatim as the `prompt` field of every transcription request.
// Whisper-style backends only read roughly the last 224 tokens of it.
export const SPELLING_PROMPT = `
Names: Gloucestershire, Kyrkjsæterøra
Here in London we honour high-calibre travellers, never take offence, and never apologise. It's 4 June 2023.
`;
