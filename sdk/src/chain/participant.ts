/** State that can be captured before a call and put back if the call throws. */
export interface Participant {
  checkpoint(): () => void;
}
