export const TUNING = {
  movement: {
    baseSpeed: 4,
    speedRange: 4,
    baseAcceleration: 8,
    accelerationRange: 8
  },
  arrive: {
    slowingDistance: 6
  },
  pressure: {
    distance: 6
  },
  support: {
    distance: 10
  },
  pass: {
    maxDistance: 20,
    minClearance: 5,
    laneCosine: 0.8,
    baseForce: 12,
    forcePerMetre: 0.6,
    maxForce: 28
  },
  run: {
    aheadOfBall: 12,
    widthPull: 0.3
  },
  dribble: {
    evadeDistance: 4,
    evadeWeight: 0.5
  },
  shooting: {
    distance: 20,
    maxDistance: 32,
    decisionThreshold: 0.6,
    force: 26,
    maxJitter: 3.5
  },
  pressing: {
    distance: 15,
    giveUpDistance: 22
  },
  tackle: {
    distance: 1.8,
    reach: 2.5,
    baseChance: 0.5,
    minChance: 0.1,
    maxChance: 0.9
  },
  marking: {
    distance: 12,
    releaseDistance: 20
  },
  covering: {
    ballWeight: 0.35,
    looseBallDistance: 8
  },
  clearance: {
    force: 24,
    lift: 0.35
  },
  goalkeeper: {
    claimDistance: 2,
    comingOutDistance: 16,
    maxLineOffset: 6,
    lineOffsetFactor: 0.1
  },
  ball: {
    controlDistance: 1.2,
    controlSpeed: 6,
    carryOffset: 0.6,
    friction: 0.96,
    stopSpeed: 0.05
  }
};

export type EngineTuning = typeof TUNING;
