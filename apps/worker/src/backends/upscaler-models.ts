export type UpscalerModel = {
  model: string;
  /** CLI flags; `true` is a bare switch, numbers are passed as values. */
  settings: Record<string, number | boolean>;
};

export const DEFAULT_TAPE_TYPE = 'VHS';

export const UPSCALER_MODELS: Record<string, UpscalerModel> = {
  VHS: {
    model: 'Artemis',
    settings: { noise_reduction: 0.8, sharpening: 0.6, deblur: 0.4, grain_reduction: 0.7 },
  },
  MINIDV: {
    model: 'Iris',
    settings: { noise_reduction: 0.3, sharpening: 0.4, deblur: 0.2, grain_reduction: 0.2 },
  },
  HI8: {
    model: 'Artemis',
    settings: { noise_reduction: 0.6, sharpening: 0.5, deblur: 0.5, grain_reduction: 0.6 },
  },
  BETAMAX: {
    model: 'Artemis',
    settings: { noise_reduction: 0.7, sharpening: 0.5, deblur: 0.4, grain_reduction: 0.6 },
  },
  DIGITAL8: {
    model: 'Iris',
    settings: { noise_reduction: 0.3, sharpening: 0.3, deblur: 0.2, grain_reduction: 0.2 },
  },
  SUPER8: {
    model: 'Gaia',
    settings: {
      noise_reduction: 0.5,
      sharpening: 0.6,
      deblur: 0.3,
      grain_preservation: true,
      film_grain: 0.3,
    },
  },
};
