export interface LikeState {
  liked: boolean;
  likesCount: number;
  isLoading: boolean;
  error: string | null;
}
