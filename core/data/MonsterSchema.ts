import { z } from "zod";
import { ABILITIES, DAMAGE_TYPES, SKILLS } from "../characters/Abilities";

const AbilitySchema = z.enum(ABILITIES);
const DamageTypeSchema = z.enum(DAMAGE_TYPES);
const SkillSchema = z.enum(SKILLS);
const DiceSchema = z.string().regex(/^\d*d\d+$/, "expected a dice expression such as 2d6");

/** DC is 8 + proficiency + the monster's `dcAbility` modifier. */
const SavingThrowSchema = z.object({
  save: AbilitySchema,
  dcAbility: AbilitySchema,
});

export const OnHitRiderSchema = z.discriminatedUnion("type", [
  SavingThrowSchema.extend({
    type: z.literal("condition"),
    condition: z.literal("paralyzed"),
    rounds: z.number().int().positive(),
    /** Species tags that are never affected (elves against ghoul claws). */
    exemptTags: z.array(z.string()).default([]),
  }),
  SavingThrowSchema.extend({
    type: z.literal("damage"),
    dice: DiceSchema,
    damageType: DamageTypeSchema,
    poison: z.boolean().default(false),
    paralyzeOnDrop: z.boolean().default(false),
  }),
  SavingThrowSchema.extend({
    type: z.literal("knock-prone"),
  }),
  SavingThrowSchema.extend({
    type: z.literal("drain-max-hp"),
  }),
]);

export type OnHitRider = z.infer<typeof OnHitRiderSchema>;

export const MonsterWeaponSchema = z.object({
  dice: DiceSchema,
  damageType: DamageTypeSchema,
  ability: AbilitySchema.default("str"),
  proficient: z.boolean().default(true),
  ranged: z.boolean().default(false),
  addAbilityToDamage: z.boolean().default(true),
  attackBonus: z.number().int().default(0),
  damageBonus: z.number().int().default(0),
  secondary: z
    .object({
      dice: DiceSchema,
      damageType: DamageTypeSchema,
    })
    .optional(),
  onHit: z.array(OnHitRiderSchema).default([]),
});

export type MonsterWeaponData = z.infer<typeof MonsterWeaponSchema>;

export const MonsterTacticSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("attack"),
    /** One entry per attack of the action, each against a fresh target. */
    weapons: z.array(z.string()).min(1),
    versusParalyzed: z.string().optional(),
  }),
  z.object({
    type: z.literal("hide"),
  }),
]);

export type MonsterTactic = z.infer<typeof MonsterTacticSchema>;

export const MonsterTraitSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("pack-tactics") }),
  z.object({ type: z.literal("martial-advantage"), dice: DiceSchema }),
  z.object({ type: z.literal("surprise-attack"), dice: DiceSchema }),
  z.object({ type: z.literal("rampage"), weapon: z.string() }),
  z.object({ type: z.literal("undead-fortitude") }),
]);

export type MonsterTrait = z.infer<typeof MonsterTraitSchema>;

const AbilityModifiersSchema = z.object({
  str: z.number().int().default(0),
  dex: z.number().int().default(0),
  con: z.number().int().default(0),
  int: z.number().int().default(0),
  wis: z.number().int().default(0),
  cha: z.number().int().default(0),
});

export const MonsterStatBlockSchema = z
  .object({
    name: z.string().min(1),
    abilities: AbilityModifiersSchema,
    armorBase: z.number().int().min(0),
    armorType: z.enum(["light", "medium", "heavy"]).default("light"),
    hitDie: z.number().int().positive(),
    hitDice: z.number().int().min(0),
    hitPointBonus: z.number().int().default(0),
    proficiency: z.number().int().min(0).default(2),
    saveProficiencies: z.array(AbilitySchema).default([]),
    skillProficiencies: z.array(SkillSchema).default([]),
    skillExpertise: z.array(SkillSchema).default([]),
    immunities: z.array(DamageTypeSchema).default([]),
    resistances: z.array(DamageTypeSchema).default([]),
    vulnerabilities: z.array(DamageTypeSchema).default([]),
    undeadRating: z.number().min(0).nullable().default(null),
    construct: z.boolean().default(false),
    tags: z.array(z.string()).default([]),
    weapons: z.record(MonsterWeaponSchema),
    tactics: z.array(MonsterTacticSchema).min(1),
    traits: z.array(MonsterTraitSchema).default([]),
  })
  .superRefine((block, ctx) => {
    const known = new Set(Object.keys(block.weapons));
    block.tactics.forEach((tactic, index) => {
      if (tactic.type !== "attack") {
        return;
      }
      [...tactic.weapons, ...(tactic.versusParalyzed ? [tactic.versusParalyzed] : [])].forEach((weapon) => {
        if (!known.has(weapon)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["tactics", index],
            message: `Unknown weapon '${weapon}'`,
          });
        }
      });
    });
    block.traits.forEach((trait, index) => {
      if (trait.type === "rampage" && !known.has(trait.weapon)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["traits", index, "weapon"],
          message: `Unknown weapon '${trait.weapon}'`,
        });
      }
    });
  });

export type MonsterStatBlock = z.infer<typeof MonsterStatBlockSchema>;
export type MonsterStatBlockInput = z.input<typeof MonsterStatBlockSchema>;

export const BestiaryManifestSchema = z.object({
  monsters: z.array(z.string().min(1)),
});

export type BestiaryManifest = z.infer<typeof BestiaryManifestSchema>;
