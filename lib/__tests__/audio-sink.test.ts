import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { decodePcm16, PcmAudioSink } from '../audio-sink';
import { pcm16, RecordingOutput } from './test-helpers';

describe('decodePcm16', () => {
  it('splits interleaved stereo into planar float channels', () => {
    const frame = decodePcm16(pcm16([[32767, -32767], [0, 16384]]));

    expect(frame.sampleRate).toBe(48_000);
    expect(frame.frameCount).toBe(2);
    expect(Array.from(frame.channels[0])).toEqual([1, 0]);
    expect(frame.channels[1][0]).toBe(-1);
    expect(frame.channels[1][1]).toBeCloseTo(0.5, 4);
  });

  it('ignores a trailing partial frame', () => {
    const pcm = Buffer.concat([pcm16([[1, 2]]), Buffer.from([9, 9])]);
    expect(decodePcm16(pcm).frameCount).toBe(1);
  });

  it('reads from a view into a larger buffer', () => {
    const backing = pcm16([[0, 0], [32767, 32767]]);
    const view = new Uint8Array(backing.buffer, backing.byteOffset + 4, 4);
    expect(Array.from(decodePcm16(view).channels[0])).toEqual([1]);
  });
});

describe('PcmAudioSink playback', () => {
  it('drops audio while stopped', () => {
    const output = new RecordingOutput();
    const sink = new PcmAudioSink(output);
    sink.enqueue(pcm16([[1, 1]]));
    expect(output.frames).toEqual([]);
  });

  it('writes audio straight through while playing', () => {
    const output = new RecordingOutput();
    const sink = new PcmAudioSink(output);
    sink.start();
    sink.enqueue(pcm16([[1, 1]]));
    sink.enqueue(new Uint8Array(0));
    expect(output.frames).toHaveLength(1);
  });

  it('holds audio while paused and releases it in order on resume', () => {
    const output = new RecordingOutput();
    const sink = new PcmAudioSink(output);
    sink.start();
    sink.pause();
    sink.enqueue(pcm16([[32767, 0]]));
    sink.enqueue(pcm16([[0, 0]]));
    expect(output.frames).toEqual([]);

    sink.resume();
    expect(output.frames.map((f) => f.channels[0][0])).toEqual([1, 0]);
    expect(sink.currentState).toBe('playing');
  });

  it('stop discards held audio and flushes the output', () => {
    const output = new RecordingOutput();
    const sink = new PcmAudioSink(output);
    sink.start();
    sink.pause();
    sink.enqueue(pcm16([[1, 1]]));
    sink.stop();
    sink.start();

    expect(output.frames).toEqual([]);
    expect(output.flushes).toBe(1);
  });

  it('pause is ignored unless playing', () => {
    const sink = new PcmAudioSink(new RecordingOutput());
    sink.pause();
    expect(sink.currentState).toBe('stopped');
  });
});

describe('PcmAudioSink fades', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fades in over the requested time in fifty steps', () => {
    const output = new RecordingOutput();
    const sink = new PcmAudioSink(output);
    sink.start();
    sink.fadeIn(5);
    expect(output.volumes).toEqual([0]);

    vi.advanceTimersByTime(100);
    expect(sink.currentVolume).toBeCloseTo(0.02, 10);
    vi.advanceTimersByTime(2_400);
    expect(sink.currentVolume).toBe(0.5);

    vi.advanceTimersByTime(2_500);
    expect(sink.currentVolume).toBe(1);
    expect(sink.isFading).toBe(false);
    expect(output.volumes).toHaveLength(51);

    vi.advanceTimersByTime(1_000);
    expect(output.volumes).toHaveLength(51);
  });

  it('fades out from the current volume', () => {
    const output = new RecordingOutput();
    const sink = new PcmAudioSink(output);
    sink.fadeOut(1);
    expect(output.volumes).toEqual([1]);

    vi.advanceTimersByTime(1_000);
    expect(sink.currentVolume).toBe(0);
    expect(sink.isFading).toBe(false);
  });

  it('cancelFade stops the fade and restores full volume', () => {
    const output = new RecordingOutput();
    const sink = new PcmAudioSink(output);
    sink.fadeIn(5);
    vi.advanceTimersByTime(1_000);

    sink.cancelFade();
    expect(sink.currentVolume).toBe(1);
    const writes = output.volumes.length;
    vi.advanceTimersByTime(5_000);
    expect(output.volumes).toHaveLength(writes);
  });

  it('cancelFade without a fade touches nothing', () => {
    const output = new RecordingOutput();
    const sink = new PcmAudioSink(output);
    sink.cancelFade();
    expect(output.volumes).toEqual([]);
  });

  it('starting a new fade replaces the running one', () => {
    const output = new RecordingOutput();
    const sink = new PcmAudioSink(output);
    sink.fadeIn(5);
    vi.advanceTimersByTime(2_500);
    sink.fadeOut(1);

    vi.advanceTimersByTime(1_000);
    expect(sink.currentVolume).toBe(0);
    vi.advanceTimersByTime(5_000);
    expect(sink.currentVolume).toBe(0);
  });
});
