import { isClaim, renderSegments, segmentAnswer } from './segmenter.js';

describe('segmentAnswer', () => {
  it('should split on sentence punctuation and line breaks', () => {
    const segments = segmentAnswer(
      'To initialize a Chroma vector store, call Chroma with a persist_directory. It stores data on disk!\nIs that clear?'
    );

    expect(segments).toEqual([
      {
        text: 'To initialize a Chroma vector store, call Chroma with a persist_directory.',
        isClaim: true,
        trailing: ' ',
      },
      { text: 'It stores data on disk!', isClaim: true, trailing: '\n' },
      { text: 'Is that clear?', isClaim: false, trailing: '' },
    ]);
  });

  it('should keep fenced code blocks whole', () => {
    const segments = segmentAnswer('Install the client package first.\n```bash\nnpm install chromadb\n```\nThen run the script.');

    expect(segments).toEqual([
      { text: 'Install the client package first.', isClaim: true, trailing: '\n' },
      { text: '```bash\nnpm install chromadb\n```', isClaim: false, trailing: '\n' },
      { text: 'Then run the script.', isClaim: false, trailing: '' },
    ]);
  });

  it('should treat an unclosed fence as code to the end', () => {
    const segments = segmentAnswer("Example:\n```ts\nconsole.log('hi')");

    expect(segments).toEqual([
      { text: 'Example:', isClaim: false, trailing: '\n' },
      { text: "```ts\nconsole.log('hi')", isClaim: false, trailing: '' },
    ]);
  });

  it('should not split inside numbers', () => {
    const segments = segmentAnswer('Version 1.2 adds streaming support for agents.');

    expect(segments).toHaveLength(1);
    expect(segments[0].isClaim).toBe(true);
  });

  it('should attach whitespace after a code block to the block', () => {
    const segments = segmentAnswer('```x```  after text here');

    expect(segments).toEqual([
      { text: '```x```', isClaim: false, trailing: '  ' },
      { text: 'after text here', isClaim: false, trailing: '' },
    ]);
  });

  it('should return nothing for blank text', () => {
    expect(segmentAnswer('')).toEqual([]);
    expect(segmentAnswer(' \n ')).toEqual([]);
  });

  it.each([
    '  Leading space. Then two sentences!  ',
    'Line one\n\n\nLine two.\r\nLine three',
    'Intro:\n\n```js\nconst a = 1;\n```\n\n```sh\nnpm test\n```\nDone.',
    'Trailing spaces before code   ```\ncode\n```   tail',
  ])('should reproduce the input when rendered: %j', (text) => {
    expect(renderSegments(segmentAnswer(text))).toBe(text.trimStart());
  });
});

describe('isClaim', () => {
  it('should reject questions, even with a closing quote', () => {
    expect(isClaim('Which embedding model does the retriever use?')).toBe(false);
    expect(isClaim('Did you set "persist_directory?"')).toBe(false);
  });

  it('should reject hedges and pleasantries', () => {
    expect(isClaim("I'm not sure about the retry settings in this library.")).toBe(false);
    expect(isClaim('Sorry, the documentation does not cover pagination settings.')).toBe(false);
    expect(isClaim('Let me know whether the vector store loads correctly.')).toBe(false);
  });

  it('should not mistake words that merely start like an opener', () => {
    expect(isClaim('History buffers keep previous chat messages available.')).toBe(true);
  });

  it('should require enough content words', () => {
    expect(isClaim('See above.')).toBe(false);
    expect(isClaim('See above.', 1)).toBe(true);
  });

  it('should never treat code as a claim', () => {
    expect(isClaim('```ts\nconst store = new Chroma({ persistDirectory: "db" })\n```')).toBe(false);
  });
});
