export type MoveRejectReason = "invalid_board" | "out_of_range" | "game_over" | "invalid_move";
