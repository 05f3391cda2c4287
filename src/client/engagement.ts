// Optimistic like/dislike state for a single post and session. Mirrors the
// server rule: one reaction per session, repeating it clears it.

import type { EngageResponse, EngagementDto } from '../types/api.js';
import type { EngagementAction } from '../types/index.js';

export interface EngagementState {
  likes: number;
  dislikes: number;
  userAction: EngagementAction | null;
}

export function engagementStateFrom(dto: EngagementDto): EngagementState {
  return { likes: dto.likes, dislikes: dto.dislikes, userAction: dto.user_action };
}

function adjust(state: EngagementState, action: EngagementAction, delta: number): EngagementState {
  return action === 'like'
    ? { ...state, likes: Math.max(0, state.likes + delta) }
    : { ...state, dislikes: Math.max(0, state.dislikes + delta) };
}

export function applyOptimisticToggle(state: EngagementState, action: EngagementAction): EngagementState {
  if (state.userAction === action) {
    return { ...adjust(state, action, -1), userAction: null };
  }
  const cleared = state.userAction ? adjust(state, state.userAction, -1) : state;
  return { ...adjust(cleared, action, 1), userAction: action };
}

/** Server counts win; the session's own reaction follows from the toggle result. */
export function reconcileEngagement(response: EngageResponse): EngagementState {
  return {
    likes: response.likes_count,
    dislikes: response.dislikes_count,
    userAction: response.was_toggle ? null : response.action,
  };
}

export function sentimentScore(state: EngagementState): number {
  return state.likes - state.dislikes;
}
