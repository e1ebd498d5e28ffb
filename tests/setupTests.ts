// Keep the table quiet and the rules file out of the way during Jest runs
process.env.NODE_ENV = 'test';
process.env.QUIET = '1';
process.env.NO_COLOR = '1';
delete process.env.BJ_DECKS;
delete process.env.BJ_MIN_BET;
delete process.env.BJ_STARTING_CHIPS;
delete process.env.BJ_RESHUFFLE_THRESHOLD;
