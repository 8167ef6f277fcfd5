import { IncompleteRecord, MalformedRecord, MissingTimestamp } from '../errors';
import { RealTimeDeltasDecoder } from '../realtime-deltas-decoder';
import { SurfaceRecordParser, type CaptureDecoder } from '../surface-parser';
import type { NativePath } from '../types';
import { MemoryFileSystem, addSurface, addTimedSurface, rtdText } from './helpers';

const FIELD = '/db/P001/Breast/Ph1/F1';
const OWNER: NativePath = { patientId: 'P001', siteId: 'Breast', phaseId: 'Ph1', fieldId: 'F1' };

function parserFor(fs: MemoryFileSystem, decoder: CaptureDecoder = new RealTimeDeltasDecoder()) {
  return new SurfaceRecordParser({ fileSystem: fs, decoder });
}

describe('SurfaceRecordParser', () => {
  let fs: MemoryFileSystem;

  beforeEach(() => {
    fs = new MemoryFileSystem();
  });

  describe('well-formed captures', () => {
    it('builds a surface from capture.ini and one monitoring recording', () => {
      addSurface(fs, `${FIELD}/Surface_1`, { monitoring: '240312_081500' });

      const { surface, warnings } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 7);

      expect(warnings).toEqual([]);
      expect(surface.id).toBe(7);
      expect(surface.label).toBe('Surface_1');
      expect(surface.capturedAt).toEqual(new Date(2024, 2, 12, 8, 15, 0));
      expect(surface.endedAt).toEqual(new Date(2024, 2, 12, 8, 15, 1));
      expect(surface.captureDetails).toEqual({ Version: '5.1', Reference: 'true' });
      expect(surface.siteDetails).toEqual({});
      expect(surface.recordings.map(r => r.label)).toEqual(['Monitoring_240312_081500']);
      expect(surface.flags).toEqual({
        suspect: false,
        outOfTolerance: null,
        missingTimestamp: false,
        beamOnSamples: 1,
        patientNotFoundSamples: 0,
      });
    });

    it('copies the owner path instead of sharing it', () => {
      addSurface(fs, `${FIELD}/Surface_1`, { monitoring: '240312_081500' });
      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0);

      expect(surface.owner).toEqual(OWNER);
      expect(surface.owner).not.toBe(OWNER);
    });

    it('strips quotes from site.ini treatment values only', () => {
      addSurface(fs, `${FIELD}/Surface_1`, {
        monitoring: '240312_081500',
        siteIni: 'Treatment Site="Left Breast"\nPhase="Ph 1"\nField=F1\nEnergy="6X"\n',
      });

      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0);

      expect(surface.siteDetails).toEqual({
        'Treatment Site': 'Left Breast',
        'Phase': 'Ph 1',
        'Field': 'F1',
        'Energy': '"6X"',
      });
    });

    it('orders recordings by start time and spans them', () => {
      addSurface(fs, `${FIELD}/Surface_1`, { monitoring: '240312_083000' });
      addSurface(fs, `${FIELD}/Surface_1`, { monitoring: '240312_081500' });

      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0);

      expect(surface.recordings.map(r => r.label)).toEqual(['Monitoring_240312_081500', 'Monitoring_240312_083000']);
      expect(surface.capturedAt).toEqual(new Date(2024, 2, 12, 8, 15, 0));
      expect(surface.endedAt).toEqual(new Date(2024, 2, 12, 8, 30, 1));
    });

    it('prefers the payload End Time for the surface end', () => {
      addSurface(fs, `${FIELD}/Surface_1`, {
        monitoring: '240312_081500',
        rtd: rtdText({ start: '240312_081500', end: '240312_082000' }),
      });

      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0);
      expect(surface.endedAt).toEqual(new Date(2024, 2, 12, 8, 20, 0));
    });
  });

  describe('capture time', () => {
    it('uses the monitoring folder time when the payload has no Start Time', () => {
      addSurface(fs, `${FIELD}/Surface_1`, { monitoring: '240312_081500', rtd: rtdText() });

      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0);

      expect(surface.capturedAt).toEqual(new Date(2024, 2, 12, 8, 15, 0));
      expect(surface.recordings[0].samples[1].clockTime).toEqual(new Date(2024, 2, 12, 8, 15, 1));
    });

    it('falls back to the capture.ini Timestamp', () => {
      addTimedSurface(fs, `${FIELD}/Surface_1`, '240312_090000');

      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0);

      expect(surface.capturedAt).toEqual(new Date(2024, 2, 12, 9, 0, 0));
      expect(surface.endedAt).toEqual(surface.capturedAt);
      expect(surface.recordings).toEqual([]);
    });

    it('falls back to a timestamp in the surface folder name', () => {
      addSurface(fs, `${FIELD}/Surface_240312_100000`);

      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_240312_100000`, OWNER, 0);
      expect(surface.capturedAt).toEqual(new Date(2024, 2, 12, 10, 0, 0));
    });

    it('keeps an undatable surface and reports MissingTimestamp', () => {
      addSurface(fs, `${FIELD}/Surface`);

      const { surface, warnings } = parserFor(fs).parse(`${FIELD}/Surface`, OWNER, 0);

      expect(surface.capturedAt).toBeNull();
      expect(surface.endedAt).toBeNull();
      expect(surface.flags.missingTimestamp).toBe(true);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toBeInstanceOf(MissingTimestamp);
      expect(warnings[0].path).toBe(`${FIELD}/Surface`);
    });
  });

  describe('plausibility', () => {
    it('marks implausible deltas as suspect without rejecting the surface', () => {
      addSurface(fs, `${FIELD}/Surface_1`, {
        monitoring: '240312_081500',
        rtd: rtdText({ start: '240312_081500', rows: ['0.0, 6.0, 0, 0, 0, 0, 0, 1'] }),
      });

      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0);
      expect(surface.flags.suspect).toBe(true);
    });

    it('honours configured limits', () => {
      addSurface(fs, `${FIELD}/Surface_1`, {
        monitoring: '240312_081500',
        rtd: rtdText({ start: '240312_081500', rows: ['0.0, 6.0, 0, 0, 0, 0, 0, 1'] }),
      });
      const parser = new SurfaceRecordParser({
        fileSystem: fs,
        decoder: new RealTimeDeltasDecoder(),
        plausibility: { maxTranslationCm: 10, maxRotationDeg: 10 },
      });

      expect(parser.parse(`${FIELD}/Surface_1`, OWNER, 0).surface.flags.suspect).toBe(false);
    });

    it('does not count patient-not-found sentinels as implausible', () => {
      addSurface(fs, `${FIELD}/Surface_1`, {
        monitoring: '240312_081500',
        rtd: rtdText({ start: '240312_081500', rows: ['0.0, 999, 999, 999, 0, 0, 0, 1'] }),
      });

      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0);

      expect(surface.flags.suspect).toBe(false);
      expect(surface.flags.patientNotFoundSamples).toBe(1);
    });

    it('reports out-of-tolerance when a recording carries thresholds', () => {
      addSurface(fs, `${FIELD}/Surface_1`, {
        monitoring: '240312_081500',
        rtd: rtdText({
          start: '240312_081500',
          header: { 'Translation Threshold (cm)': '0.1' },
          rows: ['0.0, 0.3, 0, 0, 0, 0, 0, 1'],
        }),
      });

      const { surface } = parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0);
      expect(surface.flags.outOfTolerance).toBe(true);
    });
  });

  describe('rejection', () => {
    it('throws MalformedRecord without capture.ini', () => {
      addSurface(fs, `${FIELD}/Surface_1`, { noCaptureIni: true, monitoring: '240312_081500' });
      expect(() => parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0)).toThrow(MalformedRecord);
    });

    it('throws MalformedRecord for binary ini content', () => {
      addSurface(fs, `${FIELD}/Surface_1`, { captureIni: 'Version=5\x00\x01\x02' });
      expect(() => parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0)).toThrow('Binary content in ini file');
    });

    it('throws MalformedRecord for an unreadable directory', () => {
      addSurface(fs, `${FIELD}/Surface_1`);
      fs.markUnreadable(`${FIELD}/Surface_1`);
      expect(() => parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0)).toThrow(MalformedRecord);
    });

    it('throws IncompleteRecord for a monitoring folder without its payload', () => {
      addSurface(fs, `${FIELD}/Surface_1`);
      fs.addDir(`${FIELD}/Surface_1/Monitoring_240312_081500`);

      expect(() => parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0))
        .toThrow('Monitoring folder has no RealTimeDeltas_240312_081500.txt');
      expect(() => parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0)).toThrow(IncompleteRecord);
    });

    it('passes payload errors through', () => {
      addSurface(fs, `${FIELD}/Surface_1`, { monitoring: '240312_081500', rtd: 'garbage' });
      expect(() => parserFor(fs).parse(`${FIELD}/Surface_1`, OWNER, 0)).toThrow(MalformedRecord);
    });

    it('wraps unexpected decoder failures as MalformedRecord', () => {
      addSurface(fs, `${FIELD}/Surface_1`, { monitoring: '240312_081500' });
      const failing: CaptureDecoder = {
        decode: () => {
          throw new TypeError('boom');
        },
      };

      let caught: unknown;
      try {
        parserFor(fs, failing).parse(`${FIELD}/Surface_1`, OWNER, 0);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MalformedRecord);
      expect(caught).toMatchObject({ message: 'Decoder failed: boom' });
    });
  });
});
