import { z } from 'zod';

const PositiveInt = z.number().int().gt(0);

const WindowSettings = z.object({
  width: PositiveInt,
  height: PositiveInt,
  fps: PositiveInt,
  title: z.string(),
});

const PlayerSettings = z.object({
  width: PositiveInt,
  height: PositiveInt,
  gravity: z.number().gt(0),
  flap_strength: z.number().lt(0),
  max_velocity: z.number().gt(0),
});

const WallSettings = z.object({
  width: PositiveInt,
  gap: PositiveInt,
  speed: z.number().gt(0),
});

const EnemySettings = z.object({
  width: PositiveInt,
  height: PositiveInt,
  speed: z.number().gt(0),
  spawn_rate: z.number().min(0),
  amplitude: z.number().min(0).default(100),
  phase_step: z.number().default(0.05),
  phase_spread: z.number().min(0).default(10),
});

const ProjectileSettings = z.object({
  width: PositiveInt.default(20),
  height: PositiveInt.default(10),
  speed: z.number().gt(0).default(10),
  cooldown_ms: z.number().min(0).default(500),
});

const StartButton = z.object({
  width: PositiveInt.default(240),
  height: PositiveInt.default(80),
});

const UiSettings = z.object({
  start_button: StartButton.default({}),
});

const SoundAssets = z.object({
  flap: z.string().optional(),
  enemy: z.string().optional(),
  gameover: z.string().optional(),
  background: z.string().optional(),
});

const LevelAssets = z.object({
  sounds: SoundAssets.default({}),
});

export const Level = z.object({
  name: z.string().optional(),
  wall_speed_multiplier: z.number().gt(0),
  enemy_speed_multiplier: z.number().gt(0),
  enemy_count: z.number().int().min(0),
  wall_frequency: z.number().gt(0),
  assets: LevelAssets.default({}),
});

export const GameConfig = z
  .object({
    window: WindowSettings,
    player: PlayerSettings,
    walls: WallSettings,
    enemies: EnemySettings,
    projectiles: ProjectileSettings.default({}),
    ui: UiSettings.default({}),
    levels: z.array(Level).min(1),
  })
  .superRefine((config, ctx) => {
    if (config.walls.gap * 2 > config.window.height) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['walls', 'gap'],
        message: 'gap must leave room for a gap center inside the window',
      });
    }
    if (config.enemies.height * 2 > config.window.height) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['enemies', 'height'],
        message: 'enemy height must leave room for a spawn position inside the window',
      });
    }
  });

export type LevelAssetsT = z.infer<typeof LevelAssets>;
export type SoundAssetsT = z.infer<typeof SoundAssets>;
export type GameConfigT = z.infer<typeof GameConfig>;
/** Raw shape accepted before defaults are applied. */
export type GameConfigInput = z.input<typeof GameConfig>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

export function parseGameConfig(raw: unknown): GameConfigT {
  const result = GameConfig.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid game configuration: ${formatIssues(result.error.issues)}`,
      result.error.issues,
    );
  }
  return result.data;
}

export * from './levels';
