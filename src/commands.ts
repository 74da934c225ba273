import { z } from "zod";

const IdSchema = z.string().trim().min(1);

export const EquipmentTypeSchema = z.enum(["rower", "bike", "ski"]);
export const BotDifficultySchema = z.enum(["easy", "medium", "hard", "elite"]);

export const CreateLobbySchema = z
  .object({
    creatorId: IdSchema,
    raceDistanceMeters: z.number().int().positive(),
    entryFee: z
      .string()
      .regex(/^\d+(\.\d+)?$/, "entryFee must be a non-negative decimal string")
      .optional(),
    payoutMode: z.enum(["winner_takes_all", "top_three"]).optional(),
    maxParticipants: z.number().int().min(2).max(100).optional(),
    minParticipants: z.number().int().min(2).max(100).optional()
  })
  .refine((input) => (input.minParticipants ?? 2) <= (input.maxParticipants ?? 10), {
    message: "minParticipants must not exceed maxParticipants",
    path: ["minParticipants"]
  });

export const ParticipantSchema = z.object({
  id: IdSchema,
  displayName: z.string().trim().min(1),
  walletAddress: z.string().optional(),
  equipmentType: EquipmentTypeSchema.optional()
});

export const ListLobbiesSchema = z.object({
  userId: IdSchema.optional()
});

export const LobbyPathSchema = z.object({
  lobbyId: IdSchema
});

export const RacePathSchema = z.object({
  raceId: IdSchema
});

export const UserPathSchema = z.object({
  userId: IdSchema
});

export const JoinLobbySchema = z.object({
  lobbyId: IdSchema,
  participant: ParticipantSchema
});

export const AddBotBodySchema = z.object({
  difficulty: BotDifficultySchema.default("medium")
});

export const AddBotSchema = AddBotBodySchema.extend({ lobbyId: IdSchema });

export const ParticipantActionBodySchema = z.object({
  participantId: IdSchema
});

export const ParticipantActionSchema = ParticipantActionBodySchema.extend({ lobbyId: IdSchema });

export const CancelLobbyBodySchema = z.object({
  requesterId: IdSchema
});

export const CancelLobbySchema = CancelLobbyBodySchema.extend({ lobbyId: IdSchema });

export const MetricsBodySchema = z.object({
  participantId: IdSchema,
  distance: z.number().finite().min(0),
  pace: z.number().finite().min(0),
  watts: z.number().finite().min(0)
});

export const ReportMetricsSchema = MetricsBodySchema.extend({ raceId: IdSchema });

export const IdentifySchema = z.object({
  userId: IdSchema
});

export const UserProfileInputSchema = z.object({
  displayName: z.string().trim().min(1).optional(),
  email: z.string().email().optional(),
  walletAddress: z.string().min(1).optional()
});

export const COMMAND_NAMES = [
  "session.identify",
  "lobby.create",
  "lobby.list",
  "lobby.get",
  "lobby.join",
  "lobby.addBot",
  "lobby.ready",
  "lobby.leave",
  "lobby.rejoin",
  "lobby.cancel",
  "race.start",
  "race.metrics",
  "race.get"
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export const CommandEnvelopeSchema = z.object({
  command: z.enum(COMMAND_NAMES),
  requestId: z.string().min(1).optional(),
  payload: z.unknown().optional()
});

export type CommandEnvelope = z.infer<typeof CommandEnvelopeSchema>;
