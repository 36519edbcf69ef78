import type { Genome } from "../evolution/genome.js";
import type { ControlStyle, MessageControl } from "../session/channel.js";
import { encodeActionToken, RATINGS, type Rating } from "./actionToken.js";

const RATING_STYLES: Record<Rating, ControlStyle> = {
  "-2": "danger",
  "-1": "danger",
  "0": "secondary",
  "+1": "success",
  "+2": "success",
};

export const PROMOTE_LABEL = "To standalone";

export function buildRatingControls(genome: Genome, seed: number): MessageControl[] {
  return RATINGS.map((rating) => ({
    id: encodeActionToken({ genome, seed, verb: { kind: "rate", rating } }),
    label: rating,
    style: RATING_STYLES[rating],
  }));
}

export function buildPromoteControl(genome: Genome, seed: number): MessageControl {
  return {
    id: encodeActionToken({ genome, seed, verb: { kind: "promote" } }),
    label: PROMOTE_LABEL,
    style: "primary",
  };
}
