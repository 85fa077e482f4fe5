import { describe, expect, it } from 'vitest';

import {
  buildMotionGraph,
  buildMotionJob,
  evaluateExpr,
  MOTION_PRESETS,
  motionExpressions,
  OUTPUT_FRAME,
  presetCoversOutput,
  renderExpr,
  rotationKeepsCropCovered,
} from '@domain/glitch-video/index.js';

const standard = MOTION_PRESETS.standard;

const ZOOM = '1.01+0.01*sin(2*PI*((on/30)/5))';
const X = '((iw-(iw/zoom))/2)+10*sin(2*PI*((on/30)/5)*3)+4*sin(2*PI*((on/30)/5)*7)';
const Y = '((ih-(ih/zoom))/2)+8*sin(2*PI*((on/30)/5)*2)+3*sin(2*PI*((on/30)/5)*5)';
const ANGLE = '0.006*sin(2*PI*(t/5))+0.002*sin(2*PI*(t/5)*7)';

describe('motionExpressions', () => {
  it('renders zoom, pan and sway for the standard preset', () => {
    const expressions = motionExpressions(30, 5, standard);

    expect(renderExpr(expressions.zoom)).toBe(ZOOM);
    expect(renderExpr(expressions.x)).toBe(X);
    expect(renderExpr(expressions.y)).toBe(Y);
    expect(renderExpr(expressions.angle)).toBe(ANGLE);
  });

  it('closes every cycle at the end of the clip', () => {
    const expressions = motionExpressions(30, 5, standard);
    const start = { on: 0, t: 0, iw: 1350, ih: 2400, zoom: 1.01 };
    const end = { ...start, on: 150, t: 5 };

    for (const expr of [expressions.zoom, expressions.x, expressions.y, expressions.angle]) {
      expect(evaluateExpr(expr, end)).toBeCloseTo(evaluateExpr(expr, start), 9);
    }
  });

  it('uses the whole clip as the period, not a segment', () => {
    const { zoom } = motionExpressions(30, 5, standard);

    // quarter of the clip: sine peak
    expect(evaluateExpr(zoom, { on: 37.5 })).toBeCloseTo(1.02, 10);
    expect(evaluateExpr(zoom, { on: 112.5 })).toBeCloseTo(1.0, 10);
  });

  it('keeps zoom and rotation within the preset amplitudes', () => {
    for (const preset of [MOTION_PRESETS.standard, MOTION_PRESETS.high]) {
      const { zoom, angle } = motionExpressions(24, 3, preset);
      const angleLimit = preset.rotationMain + preset.rotationJitter;

      for (let frame = 0; frame <= 72; frame += 1) {
        const zoomValue = evaluateExpr(zoom, { on: frame });
        expect(zoomValue).toBeGreaterThanOrEqual(preset.baseZoom - preset.zoomAmplitude - 1e-12);
        expect(zoomValue).toBeLessThanOrEqual(preset.baseZoom + preset.zoomAmplitude + 1e-12);
        expect(Math.abs(evaluateExpr(angle, { t: frame / 24 }))).toBeLessThanOrEqual(angleLimit + 1e-12);
      }
    }
  });
});

describe('buildMotionGraph', () => {
  it('pre-scales, zooms onto the overscan canvas, rotates and crops', () => {
    expect(buildMotionGraph(30, 5, standard)).toBe(
      '[0:v]fps=30,setpts=N/(30*TB),scale=-1:2400,' +
        `zoompan=z='${ZOOM}':x='${X}':y='${Y}':d=1:s=1152x2048:fps=30,` +
        `rotate=a='${ANGLE}':ow=rotw(iw):oh=roth(ih),` +
        'crop=1080:1920[v]',
    );
  });

  it('differs between presets only in magnitudes', () => {
    const graph = buildMotionGraph(30, 5, MOTION_PRESETS.high);

    expect(graph).toContain('scale=-1:2880');
    expect(graph).toContain("zoompan=z='1.1+0.08*sin(2*PI*((on/30)/5))'");
    expect(graph).toContain('s=1296x2304');
    expect(graph).toContain("rotate=a='0.012*sin(2*PI*(t/5))+0.004*sin(2*PI*(t/5)*7)'");
  });
});

describe('buildMotionJob', () => {
  it('reads the raw video once and has no duration cap', () => {
    const job = buildMotionJob({
      inputPath: '/work/clip_raw.mp4',
      outputPath: '/work/clip_vfx.mp4',
      fps: 30,
      totalDuration: 5,
      preset: standard,
    });

    expect(job.label).toBe('motion');
    expect(job.inputs).toEqual([{ path: '/work/clip_raw.mp4', loop: 'none' }]);
    expect(job.maps).toEqual(['[v]']);
    expect(job.durationCap).toBeUndefined();
    expect(job.audio).toBe('none');
  });
});

describe('overscan coverage', () => {
  it('holds for both presets at their maximum sway', () => {
    expect(presetCoversOutput(MOTION_PRESETS.standard)).toBe(true);
    expect(presetCoversOutput(MOTION_PRESETS.high)).toBe(true);
  });

  it('fails when the canvas has no margin around the crop', () => {
    expect(rotationKeepsCropCovered(OUTPUT_FRAME, OUTPUT_FRAME, 0)).toBe(true);
    expect(rotationKeepsCropCovered(OUTPUT_FRAME, OUTPUT_FRAME, 0.05)).toBe(false);
  });
});
