// INPUT: settings.ts (Preferences, SwipeAction, Layout), note.ts (contentPreview, isTitleEmpty), labels.ts
// OUTPUT: DismissDirection, SwipeDirection, isSwipeActionEnabled, getDismissDirection, getDismissibleBackgrounds, swipeActionFor, showContentPreview, tileBackground, tileBorderRadius, buildNoteTile
// POS: Note tile view model — what a tile shows and how it reacts to swipes

import { visibleLabelNamesSorted } from "./labels";
import { contentPreview, isTitleEmpty } from "./note";
import type { Layout, Preferences, SwipeAction } from "./settings";
import type { Note } from "./types";

export type DismissDirection = "none" | "horizontal" | "startToEnd" | "endToStart";

export type SwipeDirection = "right" | "left";

export function isSwipeActionEnabled(action: SwipeAction): boolean {
  return action !== "disabled";
}

/**
 * Allowed swipe directions for the tile:
 *   - right and left: horizontal
 *   - right only: startToEnd
 *   - left only: endToStart
 *   - none, or a note in the bin: none
 */
export function getDismissDirection(
  note: Pick<Note, "deleted">,
  right: SwipeAction,
  left: SwipeAction,
): DismissDirection {
  if (note.deleted) return "none";

  const rightEnabled = isSwipeActionEnabled(right);
  const leftEnabled = isSwipeActionEnabled(left);
  if (rightEnabled && leftEnabled) return "horizontal";
  if (rightEnabled) return "startToEnd";
  if (leftEnabled) return "endToStart";
  return "none";
}

export interface DismissibleBackground {
  action: SwipeAction;
  direction: SwipeDirection;
  /** Pinned notes show the "unpin" variant of the toggle. */
  alternative: boolean;
}

export function getDismissibleBackgrounds(
  note: Pick<Note, "deleted" | "pinned">,
  direction: DismissDirection,
  right: SwipeAction,
  left: SwipeAction,
): { main: DismissibleBackground | null; secondary: DismissibleBackground | null } {
  if (note.deleted) return { main: null, secondary: null };

  const background = (action: SwipeAction, swipe: SwipeDirection): DismissibleBackground => ({
    action,
    direction: swipe,
    alternative: note.pinned,
  });

  switch (direction) {
    case "none":
      return { main: null, secondary: null };
    case "horizontal":
      return { main: background(right, "right"), secondary: background(left, "left") };
    case "startToEnd":
      return { main: background(right, "right"), secondary: null };
    case "endToStart":
      return { main: background(left, "left"), secondary: null };
  }
}

/** Action to run after the tile was swiped in `swiped`. */
export function swipeActionFor(
  swiped: DismissDirection,
  right: SwipeAction,
  left: SwipeAction,
): SwipeAction {
  switch (swiped) {
    case "startToEnd":
      return right;
    case "endToStart":
      return left;
    default:
      throw new Error(`Unexpected dismiss direction after swiping on note tile: ${swiped}`);
  }
}

export interface TileContext {
  searchView: boolean;
  selected: boolean;
}

/** Whether the content preview is shown under the title. */
export function showContentPreview(
  note: Pick<Note, "title" | "content">,
  preferences: Pick<Preferences, "showTitlesOnly" | "showTitlesOnlyDisableInSearchView">,
  searchView: boolean,
): boolean {
  const previewEmpty = contentPreview(note).length === 0;
  return (
    (!preferences.showTitlesOnly && !previewEmpty) ||
    // Only titles are shown, but this note has none
    (preferences.showTitlesOnly && isTitleEmpty(note)) ||
    (searchView && preferences.showTitlesOnlyDisableInSearchView && !previewEmpty)
  );
}

export type TileBackground =
  | "surfaceContainerHigh"
  | "secondaryContainer"
  | "surfaceContainerHighest"
  | null;

export function tileBackground(context: TileContext, showTilesBackground: boolean): TileBackground {
  if (context.searchView) return "surfaceContainerHigh";
  if (context.selected) return "secondaryContainer";
  if (showTilesBackground) return "surfaceContainerHighest";
  return null;
}

export function tileBorderRadius(layout: Layout, showTilesBackground: boolean): number {
  return layout === "grid" || showTilesBackground ? 16 : 0;
}

export interface NoteTile {
  title: string | null;
  preview: string | null;
  showPinIcon: boolean;
  labels: string[] | null;
  background: TileBackground;
  borderRadius: number;
  dismissDirection: DismissDirection;
  backgrounds: { main: DismissibleBackground | null; secondary: DismissibleBackground | null };
}

export function buildNoteTile(note: Note, preferences: Preferences, context: TileContext): NoteTile {
  // Tiles in the search view are never swiped
  const dismissDirection = context.searchView
    ? "none"
    : getDismissDirection(note, preferences.swipeActionRight, preferences.swipeActionLeft);

  return {
    title: isTitleEmpty(note) ? null : note.title,
    preview: showContentPreview(note, preferences, context.searchView) ? contentPreview(note) : null,
    showPinIcon: note.pinned && !note.deleted,
    labels:
      preferences.enableLabels && preferences.showLabelsListOnNoteTile
        ? visibleLabelNamesSorted(note)
        : null,
    background: tileBackground(context, preferences.showTilesBackground),
    borderRadius: context.searchView ? 0 : tileBorderRadius(preferences.layout, preferences.showTilesBackground),
    dismissDirection,
    backgrounds: getDismissibleBackgrounds(
      note,
      dismissDirection,
      preferences.swipeActionRight,
      preferences.swipeActionLeft,
    ),
  };
}
