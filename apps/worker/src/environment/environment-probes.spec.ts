import {
  matchesHypervisorSignature,
  median,
  parseEncoderList,
} from './environment-probes';

describe('parseEncoderList', () => {
  const output = [
    'Encoders:',
    ' V..... = Video',
    ' ------',
    ' V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC',
    ' V....D h264_qsv             H.264 / AVC (Intel Quick Sync Video acceleration)',
    ' V....D h264_nvenc           NVIDIA NVENC H.264 encoder',
    ' A....D aac                  AAC (Advanced Audio Coding)',
  ].join('\n');

  it('should list the available paths in preference order', () => {
    expect(parseEncoderList(output, ['nvenc', 'qsv', 'amf'])).toEqual(['nvenc', 'qsv']);
    expect(parseEncoderList(output, ['qsv', 'nvenc'])).toEqual(['qsv', 'nvenc']);
  });

  it('should return nothing for a software-only build', () => {
    expect(parseEncoderList(' V....D libx264  libx264', ['nvenc', 'vaapi'])).toEqual([]);
  });
});

describe('matchesHypervisorSignature', () => {
  it('should recognise hypervisor vendors case-insensitively', () => {
    expect(matchesHypervisorSignature('Manufacturer  Model\nQEMU  Standard PC')).toBe(true);
    expect(matchesHypervisorSignature('Shadow Blade')).toBe(true);
  });

  it('should not flag physical hardware', () => {
    expect(matchesHypervisorSignature('Dell Inc. Precision 5820')).toBe(false);
    expect(matchesHypervisorSignature('Dell Inc. PowerEdge M640 Blade Server')).toBe(false);
  });
});

describe('median', () => {
  it('should handle odd and even sample counts', () => {
    expect(median([30, 10, 20])).toBe(20);
    expect(median([40, 10, 20, 30])).toBe(25);
  });

  it('should reject an empty sample set', () => {
    expect(() => median([])).toThrow('median of an empty sample set');
  });
});
